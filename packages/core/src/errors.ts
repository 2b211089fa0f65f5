/** An action was submitted that is not legal in the current state. */
export class InvalidActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidActionError";
  }
}

/** An operation was invoked on a state it is not defined for. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid config "${key}": ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}
