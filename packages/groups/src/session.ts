import { GroupingStateError } from "./errors.js";

export interface Group {
  readonly requestId: number;
  readonly wrapperId: string;
  childIds: string[];
  hasToolCalls: boolean;
  animatorHandle: NodeJS.Timeout | null;
  frameIndex: number;
  accumulatedText: string;
  label: string;
  finalized: boolean;
}

export interface GroupingSession {
  currentGroup: Group | null;
  readonly groups: Group[];
  groupIndex: number;
  requestCount: number;
  readonly groupsByWrapperId: Map<string, Group>;
}

export const WORKING_LABEL = "Working…";

const WRAPPER_ID_PATTERN = /^group-\d+-\d+$/;

export function createSession(requestCount = 0): GroupingSession {
  return {
    currentGroup: null,
    groups: [],
    groupIndex: 0,
    requestCount,
    groupsByWrapperId: new Map()
  };
}

/** Moves the session on to the next turn and returns its id. */
export function beginTurn(session: GroupingSession): number {
  session.requestCount += 1;
  return session.requestCount;
}

export function wrapperIdFor(requestId: number, groupIndex: number): string {
  return `group-${requestId}-${groupIndex}`;
}

export function isWrapperId(fragmentId: string): boolean {
  return WRAPPER_ID_PATTERN.test(fragmentId);
}

export function thoughtChildIdFor(wrapperId: string): string {
  return `${wrapperId}-thought`;
}

export function createGroup(requestId: number, groupIndex: number): Group {
  return {
    requestId,
    wrapperId: wrapperIdFor(requestId, groupIndex),
    childIds: [],
    hasToolCalls: false,
    animatorHandle: null,
    frameIndex: 0,
    accumulatedText: "",
    label: WORKING_LABEL,
    finalized: false
  };
}

export function registerGroup(session: GroupingSession, group: Group): void {
  if (session.groupsByWrapperId.has(group.wrapperId)) {
    throw new GroupingStateError(`Duplicate wrapper id: ${group.wrapperId}`, group.wrapperId);
  }
  session.groups.push(group);
  session.groupsByWrapperId.set(group.wrapperId, group);
  session.currentGroup = group;
}

export function currentGroupFor(session: GroupingSession): Group | null {
  return session.currentGroup;
}

export function groupForWrapper(session: GroupingSession, wrapperId: string): Group | null {
  return session.groupsByWrapperId.get(wrapperId) ?? null;
}

export function registerChild(group: Group, childId: string): void {
  if (!group.childIds.includes(childId)) {
    group.childIds.push(childId);
  }
}

/** Newest group first, so a reused child id resolves to the active phase. */
export function findOwningGroup(session: GroupingSession, childId: string): Group | null {
  for (let index = session.groups.length - 1; index >= 0; index -= 1) {
    const group = session.groups[index];
    if (group?.childIds.includes(childId)) {
      return group;
    }
  }
  return null;
}
