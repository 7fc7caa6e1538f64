export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message = `Missing required environment variable ${variable}`,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
