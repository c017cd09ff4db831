/**
 * Raised when local configuration (CLI options or credential files) is
 * missing, unreadable or malformed
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    /** The credential file at fault, when there is one */
    public readonly path?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
