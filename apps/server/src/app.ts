import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import { type BanSyncService, type LoggerPort, type LogLevel, isRecord } from "bansync-core";
import {
  type HandlerResult,
  callerFromHeaders,
  handleCreateNetwork,
  handleJoinNetwork,
  handleLeaveNetwork,
  handleListNetworks,
  handleRecentBans,
  handleSyncBan,
} from "adapter-http";
import { DEFAULT_PREFIX, runCommand } from "adapter-commands";
import { pinoLogger } from "./logger";

export interface AppOptions {
  /** Built once the app logger exists, so core log lines go through pino. */
  createService: (logger: LoggerPort) => BanSyncService;
  logLevel?: LogLevel;
  commandPrefix?: string;
}

function send(reply: FastifyReply, res: HandlerResult) {
  if (res.headers) reply.headers(res.headers);
  return reply.status(res.status).send(res.json);
}

/**
 * Build Fastify Application
 *
 *   GET    /api/health
 *   GET    /api/networks                   networks this server belongs to
 *   POST   /api/networks                   { name }
 *   POST   /api/networks/:name/members     join
 *   DELETE /api/networks/:name/members     leave
 *   POST   /api/bans                       { userId, reason? }
 *   GET    /api/bans?limit=                recent ban history
 *   POST   /api/commands                   { content } text command
 *
 * Caller identity comes from the x-server-id / x-actor-id headers.
 */
export function buildApp(opts: AppOptions): FastifyInstance {
  const app = Fastify({
    logger: { level: opts.logLevel ?? "info" },
  });
  const service = opts.createService(pinoLogger(app.log, "core"));
  const prefix = opts.commandPrefix ?? DEFAULT_PREFIX;
  const commandLog = pinoLogger(app.log, "commands");

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    app.log.error(err);

    if (err.validation) {
      return reply.status(400).send({ ok: false, error: "VALIDATION_ERROR", message: err.message });
    }

    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode < 500 ? "BAD_REQUEST" : "INTERNAL_ERROR",
      message: statusCode < 500 ? err.message : "Internal server error",
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({ ok: false, error: "NOT_FOUND", message: "Route not found" });
  });

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/networks", async (req, reply) =>
    send(reply, await handleListNetworks(service, { caller: callerFromHeaders(req.headers) })),
  );

  app.post<{ Body: unknown }>("/api/networks", async (req, reply) => {
    const name = isRecord(req.body) ? req.body.name : undefined;
    return send(reply, await handleCreateNetwork(service, { caller: callerFromHeaders(req.headers), name }));
  });

  app.post<{ Params: { name: string } }>("/api/networks/:name/members", async (req, reply) =>
    send(reply, await handleJoinNetwork(service, { caller: callerFromHeaders(req.headers), name: req.params.name })),
  );

  app.delete<{ Params: { name: string } }>("/api/networks/:name/members", async (req, reply) =>
    send(reply, await handleLeaveNetwork(service, { caller: callerFromHeaders(req.headers), name: req.params.name })),
  );

  app.post<{ Body: unknown }>("/api/bans", async (req, reply) =>
    send(reply, await handleSyncBan(service, { caller: callerFromHeaders(req.headers), body: req.body })),
  );

  app.get<{ Querystring: { limit?: string } }>("/api/bans", async (req, reply) =>
    send(reply, await handleRecentBans(service, { caller: callerFromHeaders(req.headers), limit: req.query.limit })),
  );

  app.post<{ Body: unknown }>("/api/commands", async (req, reply) => {
    const caller = callerFromHeaders(req.headers);
    if (!caller) {
      return reply.status(401).send({ ok: false, error: "UNAUTHENTICATED", message: "Missing caller identity headers" });
    }
    const content = isRecord(req.body) ? req.body.content : undefined;
    if (typeof content !== "string") {
      return reply.status(400).send({ ok: false, error: "BAD_REQUEST", message: "content is required" });
    }
    const result = await runCommand(service, caller, content, { prefix, logger: commandLog });
    return reply.send({ ok: true, value: result ?? null });
  });

  return app;
}
