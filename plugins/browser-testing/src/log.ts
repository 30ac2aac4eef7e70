/**
 * Scoped stderr logging.
 *
 * stdout carries the MCP stdio stream, so every line goes to stderr with a
 * `[scope]` prefix.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function createLogger(scope: string): Logger {
  const write = (level: string, message: string) => {
    const tag = level === 'info' ? `[${scope}]` : `[${scope}] ${level}:`;
    console.error(`${tag} ${message}`);
  };

  return {
    debug: (message) => {
      if (debugEnabled) write('debug', message);
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
