export class ConfigError extends Error {
  constructor(
    message: string,
    readonly keys: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ModelRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ModelRequestError";
  }
}

export class InvalidInputError extends Error {
  constructor(
    message: string,
    readonly issues: Record<string, string[] | undefined> = {},
  ) {
    super(message);
    this.name = "InvalidInputError";
  }
}
