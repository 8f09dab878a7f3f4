import { Server, Socket } from "socket.io";
import http from "node:http";
import { z } from "zod";
import { RoomEvent } from "../../domain/entities/roomEvent";
import { AppError } from "../../application/errors";
import { ConnectionHandle, DisconnectReason } from "../../application/ports/connection";
import { JoinRoomUseCase } from "../../application/usecases/joinRoom";
import { LeaveRoomUseCase } from "../../application/usecases/leaveRoom";
import { SubmitBidUseCase } from "../../application/usecases/submitBid";
import { log, logError } from "../../infrastructure/logging/logger";
import { serializeEvent, serializeOutcome, serializeSnapshot } from "../serialization";

const handshakeSchema = z.object({
  productId: z.string().trim().min(1).max(128),
  // Identity is established by the auth layer in front of this server and trusted as-is.
  bidderId: z.string().trim().min(1).max(128).optional()
});

export type SocketDependencies = {
  joinRoom: JoinRoomUseCase;
  submitBid: SubmitBidUseCase;
  leaveRoom: LeaveRoomUseCase;
};

/** Resolves once the underlying engine.io transport can take more writes. */
function waitForFlush(socket: Socket): Promise<void> {
  const conn = socket.conn;
  const transport = conn.transport;
  if (transport.writable) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      transport.off("drain", onDrain);
      conn.off("close", onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onClose = () => {
      cleanup();
      reject(new Error("Connection closed before flush"));
    };
    transport.on("drain", onDrain);
    conn.on("close", onClose);
  });
}

/**
 * ConnectionHandle over a socket.io socket. Room events are held back until the join
 * snapshot has been emitted, so a client never sees an event before its snapshot.
 */
export class SocketConnection implements ConnectionHandle {
  readonly id: string;
  private releaseGate: (() => void) | null = null;
  private readonly gate = new Promise<void>((resolve) => {
    this.releaseGate = resolve;
  });

  constructor(
    private readonly socket: Socket,
    readonly productId: string,
    readonly bidderId: string | null
  ) {
    this.id = socket.id;
  }

  open(): void {
    this.releaseGate?.();
  }

  async send(event: RoomEvent): Promise<void> {
    await this.gate;
    if (this.socket.disconnected) {
      throw new Error(`Socket ${this.id} is disconnected`);
    }
    this.socket.emit(event.type, serializeEvent(event));
    await waitForFlush(this.socket);
  }

  close(reason: DisconnectReason): void {
    if (this.socket.disconnected) {
      return;
    }
    if (reason !== "client") {
      this.socket.emit("room:evicted", { productId: this.productId, reason });
    }
    this.socket.disconnect(true);
  }
}

function errorBody(error: unknown) {
  if (error instanceof AppError) {
    return { error: error.code, message: error.message };
  }
  return { error: "INTERNAL_SERVER_ERROR" };
}

export function initSocketServer(server: http.Server, corsOrigin: string, deps: SocketDependencies): Server {
  const io = new Server(server, {
    cors: {
      origin: corsOrigin === "*" ? true : corsOrigin,
      credentials: true
    }
  });

  io.on("connection", (socket) => {
    const parsed = handshakeSchema.safeParse({ ...socket.handshake.query, ...socket.handshake.auth });
    if (!parsed.success) {
      socket.emit("room:error", { error: "VALIDATION_ERROR", details: parsed.error.flatten() });
      socket.disconnect(true);
      return;
    }

    const connection = new SocketConnection(socket, parsed.data.productId, parsed.data.bidderId ?? null);

    const joined = deps.joinRoom.execute(connection).then(
      (snapshot) => {
        socket.emit("room:snapshot", serializeSnapshot(snapshot));
        connection.open();
        log("info", "socket.joined", { socketId: socket.id, productId: connection.productId });
        return true;
      },
      (error: unknown) => {
        if (!(error instanceof AppError)) {
          logError("socket.join_failed", error, { socketId: socket.id, productId: connection.productId });
        }
        socket.emit("room:error", errorBody(error));
        socket.disconnect(true);
        return false;
      }
    );

    socket.on("bid", (payload: unknown, ack: unknown) => {
      const reply = (body: unknown) => {
        if (typeof ack === "function") {
          ack(body);
        } else {
          socket.emit("bid:result", body);
        }
      };
      joined
        .then(async (ok) => {
          if (!ok) {
            return;
          }
          const outcome = await deps.submitBid.execute(connection, payload);
          reply(serializeOutcome(outcome));
        })
        .catch((error: unknown) => {
          logError("socket.bid_failed", error, { socketId: socket.id, productId: connection.productId });
          reply(errorBody(error));
        });
    });

    socket.on("disconnect", () => {
      joined
        .then((ok) => (ok ? deps.leaveRoom.execute(connection) : false))
        .catch((error: unknown) => {
          logError("socket.leave_failed", error, { socketId: socket.id, productId: connection.productId });
        });
    });
  });

  return io;
}
