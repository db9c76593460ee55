import type { FastifyInstance } from "fastify";
import type { CoreContext } from "../context.js";
import {
  handleAddMember,
  handleCreateRoom,
  handleGetHistory,
  handlePostChat,
} from "../chat/handlers.js";

interface RoomParams {
  ruuid: string;
}

export function registerRoomRoutes(app: FastifyInstance, ctx: CoreContext): void {
  app.post("/room/create", async (request, reply) => {
    const room = handleCreateRoom(request.body, ctx);
    return reply.type("application/json; charset=utf-8").send(JSON.stringify(room.id));
  });

  app.get<{ Params: RoomParams }>("/room/:ruuid/item", async (request) => {
    return handleGetHistory(request.params.ruuid, request.query, request.headers.authorization, ctx);
  });

  app.post<{ Params: RoomParams }>("/room/:ruuid/item", async (request) => {
    return handlePostChat(request.params.ruuid, request.body, ctx).cid;
  });

  app.post<{ Params: RoomParams }>("/room/:ruuid/member", async (request, reply) => {
    handleAddMember(request.params.ruuid, request.body, ctx);
    return reply.code(204).send();
  });
}
