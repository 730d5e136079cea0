/**
 * Structural logger accepted by core services.
 * Fastify's request/app logger and a standalone pino instance both satisfy it.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

/**
 * Console-backed logger used when nothing is injected.
 * Messages are prefixed with the scope, e.g. `[SleepCycle] batch skipped`.
 */
export function createConsoleLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (obj, msg) => console.debug(prefix, msg ?? '', obj),
    info: (obj, msg) => console.log(prefix, msg ?? '', obj),
    warn: (obj, msg) => console.warn(prefix, msg ?? '', obj),
    error: (obj, msg) => console.error(prefix, msg ?? '', obj),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
