import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import type { CoreContext } from "./context.js";
import { ChatError, errorBody, statusFor } from "./errors.js";
import { registerRoomRoutes } from "./routes/rooms.js";
import { registerEventRoutes } from "./routes/events.js";
import { registerFeedRoutes } from "./routes/feed.js";

function statusCodeOf(err: Error): number | undefined {
  return "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : undefined;
}

/** Build the HTTP server. The database must already be initialized. */
export async function buildApp(ctx: CoreContext): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });
  await app.register(websocket);

  app.setErrorHandler((err: Error, request, reply) => {
    if (err instanceof ChatError) {
      return reply.code(statusFor(err.code)).send(errorBody(err.code, err.message));
    }

    // Body parsing and other client errors raised by Fastify itself
    const statusCode = statusCodeOf(err);
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send(errorBody("BAD_ENVELOPE", err.message));
    }

    console.error(`[http] ${request.method} ${request.url} failed:`, err);
    return reply.code(500).send(errorBody("INTERNAL", "Internal server error"));
  });

  registerRoomRoutes(app, ctx);
  registerEventRoutes(app, ctx);
  registerFeedRoutes(app, ctx);

  // Health check
  app.get("/health", async () => ({ status: "ok" }));

  return app;
}
