/**
 * ConfigError: missing or invalid configuration
 */

export class ConfigError extends Error {
  public readonly variables: string[];

  constructor(message: string, variables: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.variables = variables;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}
