/**
 * Logger contract shared by the domain services.
 *
 * Same (obj, msg) shape as Fastify's pino logger, so either can be injected.
 * The default implementation prints tagged console lines.
 */

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

function format(tag: string, msg: string | undefined, obj: unknown): unknown[] {
  const head = `[${tag}] ${msg ?? ''}`.trimEnd();
  if (typeof obj === 'string') {
    return msg ? [head, obj] : [`[${tag}] ${obj}`];
  }
  return obj === undefined ? [head] : [head, obj];
}

export function createLogger(tag: string): Logger {
  return {
    info: (obj, msg) => console.log(...format(tag, msg, obj)),
    warn: (obj, msg) => console.warn(...format(tag, msg, obj)),
    error: (obj, msg) => console.error(...format(tag, msg, obj)),
    debug: (obj, msg) => console.debug(...format(tag, msg, obj)),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
