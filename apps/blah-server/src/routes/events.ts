import type { FastifyInstance } from "fastify";
import type { ServerResponse } from "node:http";
import type { WebSocket } from "ws";
import { WS_CLOSE_LAGGED } from "@blah/protocol";
import type { CoreContext } from "../context.js";
import { handleSubscribe } from "../chat/handlers.js";
import type { Subscription } from "../events/fanout.js";
import { ChatError, errorBody } from "../errors.js";

/** A WebSocket peer this far behind is treated as lagging */
const WS_MAX_BUFFERED_BYTES = 1024 * 1024;

interface RoomParams {
  ruuid: string;
}

function waitForDrain(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

async function pumpSse(res: ServerResponse, sub: Subscription): Promise<void> {
  for await (const item of sub) {
    if (res.destroyed) break;
    if (!res.write(`data: ${JSON.stringify(item)}\n\n`)) {
      await waitForDrain(res);
    }
  }
  if (res.destroyed) return;
  if (sub.closeReason === "lagged") {
    res.write("event: lagged\ndata: {}\n\n");
  }
  res.end();
}

async function pumpWs(socket: WebSocket, sub: Subscription): Promise<void> {
  for await (const item of sub) {
    if (socket.readyState !== socket.OPEN) break;
    if (socket.bufferedAmount > WS_MAX_BUFFERED_BYTES) {
      sub.close("lagged");
      break;
    }
    socket.send(JSON.stringify(item));
  }
  if (socket.readyState !== socket.OPEN) return;
  if (sub.closeReason === "lagged") {
    socket.close(WS_CLOSE_LAGGED, "lagged");
  } else if (sub.closeReason === "shutdown") {
    socket.close(1001, "shutdown");
  }
}

export function registerEventRoutes(app: FastifyInstance, ctx: CoreContext): void {
  // Server-sent events: one `data:` line per chat item, in cid order
  app.get<{ Params: RoomParams }>("/room/:ruuid/event", async (request, reply) => {
    const sub = handleSubscribe(request.params.ruuid, request.headers.authorization, ctx);

    reply.hijack();
    const res = reply.raw;
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(": subscribed\n\n");
    res.on("close", () => sub.close("unsubscribed"));

    await pumpSse(res, sub);
  });

  // Same stream over a WebSocket, one JSON chat item per message
  app.get<{ Params: RoomParams }>("/room/:ruuid/ws", { websocket: true }, (socket, request) => {
    let sub: Subscription;
    try {
      sub = handleSubscribe(request.params.ruuid, request.headers.authorization, ctx);
    } catch (err) {
      if (err instanceof ChatError) {
        socket.send(JSON.stringify(errorBody(err.code, err.message)));
        socket.close(1008, err.code);
        return;
      }
      console.error("[ws] Subscribe failed:", err);
      socket.close(1011, "INTERNAL");
      return;
    }

    socket.on("close", () => sub.close("unsubscribed"));
    pumpWs(socket, sub).catch((err: unknown) => {
      console.error("[ws] Stream failed:", err);
      sub.close("unsubscribed");
    });
  });
}
