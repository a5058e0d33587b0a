import pino from 'pino';
import type { Logger } from 'pino';

/** Addresses (or other units) between two progress lines. */
export const PROGRESS_EVERY = 5_000;

/**
 * pino options for one process. `LOG_LEVEL` wins; otherwise production runs at
 * `info` with ISO timestamps and everything else at `debug`.
 */
export function loggerOptions(env: NodeJS.ProcessEnv): pino.LoggerOptions {
  const production = env.NODE_ENV === 'production';
  return {
    level: env.LOG_LEVEL || (production ? 'info' : 'debug'),
    ...(production ? { timestamp: pino.stdTimeFunctions.isoTime } : {}),
    base: { pid: process.pid, service: 'quote-shards' },
    serializers: { err: pino.stdSerializers.err },
  };
}

export const logger = pino(loggerOptions(process.env));

/** Child logger tagged with the component that writes through it. */
export const componentLogger = (component: string, fields?: Record<string, unknown>): Logger =>
  logger.child({ component, ...fields });

export const loaderLogger = componentLogger('loader');
export const plannerLogger = componentLogger('planner');
export const fillerLogger = componentLogger('filler');
export const rulesLogger = componentLogger('rules');
export const generatorLogger = componentLogger('generator');
export const simulatorLogger = componentLogger('simulator');
export const previewLogger = componentLogger('preview');

/** `<operation> completed in Nms`, with the elapsed time as a field. */
export function logElapsed(log: Logger, operation: string, since: number, fields?: Record<string, unknown>): void {
  const duration = Date.now() - since;
  log.info({ operation, duration, ...fields }, `${operation} completed in ${duration}ms`);
}

/** Errors go out under `err`; anything thrown that is not an Error is stringified. */
export function logFailure(log: Logger, error: unknown, fields?: Record<string, unknown>): void {
  if (error instanceof Error) {
    log.error({ err: error, ...fields }, error.message);
    return;
  }
  log.error({ error: String(error), ...fields }, 'Non-error value thrown');
}

export interface Progress {
  /** Count one unit; logs on every `every`-th call. */
  tick(): void;
  readonly done: number;
}

/** Debug-level `Progress: done/total` lines for a long loop. */
export function createProgress(log: Logger, total: number, every: number = PROGRESS_EVERY): Progress {
  let done = 0;
  return {
    tick() {
      done++;
      if (done % every === 0) log.debug({ done, total }, `Progress: ${done}/${total}`);
    },
    get done() { return done; },
  };
}

export type { Logger };
