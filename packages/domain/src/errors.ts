export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** A parameter set is incomplete or holds values the simulator cannot run with. */
export class ConfigurationError extends Error {
  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = "ConfigurationError";
  }

  static missing(field: string): ConfigurationError {
    return new ConfigurationError(`Missing required parameter: ${field}`, field);
  }
}

/** Frequency and time series that cannot be simulated as given. */
export class InputShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputShapeError";
  }
}
