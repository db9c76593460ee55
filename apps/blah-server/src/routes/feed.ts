import type { FastifyInstance } from "fastify";
import type { CoreContext } from "../context.js";
import { buildRoomFeed } from "../feed/feed.js";

export function registerFeedRoutes(app: FastifyInstance, ctx: CoreContext): void {
  app.get<{ Params: { ruuid: string } }>("/room/:ruuid/feed.json", async (request, reply) => {
    const feed = buildRoomFeed(request.params.ruuid, ctx);
    return reply.header("Content-Type", "application/feed+json; charset=utf-8").send(feed.json1());
  });
}
