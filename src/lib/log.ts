export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

/**
 * Console logger with a `[Scope]` prefix. Debug output only appears in
 * dev builds (and under Vitest); plain Node leaves `import.meta.env` unset.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, ...args) {
      if (import.meta.env?.DEV) {
        console.log(`${prefix} ${message}`, ...args);
      }
    },

    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args);
    },
  };
}
