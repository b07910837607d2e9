export class GroupingError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "GroupingError";
  }
}

export class GroupingStateError extends GroupingError {
  public readonly wrapperId: string;

  public constructor(message: string, wrapperId: string) {
    super(message);
    this.name = "GroupingStateError";
    this.wrapperId = wrapperId;
  }
}

export class GroupingConfigError extends GroupingError {
  public readonly variable: string;

  public constructor(variable: string, value: string) {
    super(`Invalid value for ${variable}: "${value}"`);
    this.name = "GroupingConfigError";
    this.variable = variable;
  }
}
