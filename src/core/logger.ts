/**
 * Logging for the registrar
 * Hosts pass their own logger; console output is the fallback.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Env var that turns on debug output for consoleLogger */
export const DEBUG_ENV_VAR = 'SECRETS_REGISTRAR_DEBUG';

export const consoleLogger: Logger = {
  debug(message) {
    if (process.env[DEBUG_ENV_VAR]) {
      console.debug(`[secrets] ${message}`);
    }
  },
  info(message) {
    console.log(`[secrets] ${message}`);
  },
  warn(message) {
    console.warn(`[secrets] ${message}`);
  },
  error(message) {
    console.error(`[secrets] ${message}`);
  },
};

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
