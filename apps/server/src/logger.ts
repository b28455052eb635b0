import type { FastifyBaseLogger } from "fastify";
import type { LoggerPort, LogMeta } from "bansync-core";

/** Route core log lines through Fastify's pino instance, under a `scope` binding. */
export function pinoLogger(log: FastifyBaseLogger, scope: string): LoggerPort {
  const child = log.child({ scope });
  return {
    debug: (msg: string, meta?: LogMeta) => child.debug(meta ?? {}, msg),
    info: (msg: string, meta?: LogMeta) => child.info(meta ?? {}, msg),
    warn: (msg: string, meta?: LogMeta) => child.warn(meta ?? {}, msg),
    error: (msg: string, meta?: LogMeta) => child.error(meta ?? {}, msg),
  };
}
