/**
 * Console logger with a switchable debug level
 *
 * Info, warnings and errors always go to the console. Debug lines are only
 * printed once `setVerbose(true)` has been called (the `--verbose` flag).
 */

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export const logger = {
  debug(message: string, ...details: unknown[]): void {
    if (verbose) {
      console.debug(message, ...details);
    }
  },

  info(message: string, ...details: unknown[]): void {
    console.log(message, ...details);
  },

  warn(message: string, ...details: unknown[]): void {
    console.warn(message, ...details);
  },

  error(message: string, ...details: unknown[]): void {
    console.error(message, ...details);
  },
};
