import http from "node:http";
import { env } from "./config/env";
import { connectMongo, disconnectMongo, ensureIndexes } from "./infrastructure/db/mongo";
import {
  MongoAuctionRepository,
  MongoBidRepository
} from "./infrastructure/repositories/mongoRepositories";
import { closeRedis, getRedis } from "./infrastructure/cache/redis";
import { RedisRateLimitCounter } from "./infrastructure/cache/rateLimitCounter";
import { BullMqBidRecorder, startRecordBidWorker } from "./infrastructure/queue/bullmq";
import { NodeRoomTimer } from "./infrastructure/scheduling/nodeTimer";
import { createApp } from "./presentation/http/app";
import { initSocketServer } from "./presentation/ws/socket";
import { RoomRegistry } from "./application/rooms/roomRegistry";
import { JoinRoomUseCase } from "./application/usecases/joinRoom";
import { SubmitBidUseCase } from "./application/usecases/submitBid";
import { LeaveRoomUseCase } from "./application/usecases/leaveRoom";
import { CloseAuctionUseCase } from "./application/usecases/closeAuction";
import { log, logError, setLogLevel } from "./infrastructure/logging/logger";

async function bootstrap() {
  setLogLevel(env.LOG_LEVEL);
  await connectMongo();
  await ensureIndexes();

  const auctions = new MongoAuctionRepository();
  const bids = new MongoBidRepository();
  const recorder = new BullMqBidRecorder();
  const timer = new NodeRoomTimer();

  const registry = new RoomRegistry(auctions, bids, recorder, timer, {
    mailboxCapacity: env.ROOM_MAILBOX_CAPACITY,
    submitTimeoutMs: env.ROOM_SUBMIT_TIMEOUT_MS,
    recentBidsLimit: env.ROOM_RECENT_BIDS_LIMIT,
    subscriberQueueLimit: env.SUBSCRIBER_QUEUE_LIMIT,
    sendTimeoutMs: env.SUBSCRIBER_SEND_TIMEOUT_MS
  });

  const joinRoom = new JoinRoomUseCase(registry);
  const submitBid = new SubmitBidUseCase(registry);
  const leaveRoom = new LeaveRoomUseCase(registry);
  const closeAuction = new CloseAuctionUseCase(registry);

  const server = http.createServer();
  const io = initSocketServer(server, env.CORS_ORIGIN, { joinRoom, submitBid, leaveRoom });

  const app = createApp(
    {
      registry,
      closeAuction,
      rateLimitCounter: new RedisRateLimitCounter(getRedis()),
      adminToken: env.ADMIN_TOKEN,
      adminRateLimit: {
        windowMs: env.ADMIN_RATE_LIMIT_WINDOW_MS,
        maxRequests: env.ADMIN_RATE_LIMIT_MAX
      }
    },
    env.CORS_ORIGIN
  );
  server.on("request", (req, res) => {
    if (req.url?.startsWith("/socket.io")) {
      return;
    }
    app(req, res);
  });

  const worker = startRecordBidWorker(async (bid) => {
    await bids.insert(bid);
  });

  server.listen(env.PORT, () => {
    log("info", "server.started", { port: env.PORT });
  });

  const shutdown = async (signal: string) => {
    log("info", "server.stopping", { signal });
    registry.shutdown();
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
    await worker.close();
    await recorder.close();
    await closeRedis();
    await disconnectMongo();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        logError("server.shutdown_failed", error);
        process.exit(1);
      });
    });
  }
}

bootstrap().catch((error) => {
  logError("server.bootstrap_failed", error);
  process.exit(1);
});
