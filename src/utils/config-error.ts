/**
 * Fatal configuration problem, raised before any file is processed
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly option?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
