import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { AppError } from "../../application/errors";
import { RateLimitCounter } from "../../application/ports/services";
import { RoomRegistry } from "../../application/rooms/roomRegistry";
import { CloseAuctionUseCase } from "../../application/usecases/closeAuction";
import { rateLimiter } from "./rateLimiter";
import { serializeSnapshot } from "../serialization";

const productIdSchema = z.string().trim().min(1).max(128);

export type RouterDependencies = {
  registry: RoomRegistry;
  closeAuction: CloseAuctionUseCase;
  rateLimitCounter: RateLimitCounter;
  adminToken: string;
  adminRateLimit: { windowMs: number; maxRequests: number };
};

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

const asyncHandler = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export function createRouter(deps: RouterDependencies): Router {
  const router = Router();

  const adminGuard = (req: Request, res: Response, next: NextFunction) => {
    if (!deps.adminToken) {
      return next();
    }
    const token = req.header("x-admin-token");
    if (!token || token !== deps.adminToken) {
      return res.status(401).json({ error: "UNAUTHORIZED", message: "Invalid admin token" });
    }
    return next();
  };

  const adminLimiter = rateLimiter({
    counter: deps.rateLimitCounter,
    windowMs: deps.adminRateLimit.windowMs,
    maxRequests: deps.adminRateLimit.maxRequests,
    keyPrefix: "ratelimit:admin"
  });

  router.get("/health", (_req, res) => {
    res.json({ status: "ok", rooms: deps.registry.size, time: new Date().toISOString() });
  });

  router.get("/rooms", (_req, res) => {
    res.json({ rooms: deps.registry.stats() });
  });

  router.get(
    "/rooms/:productId",
    asyncHandler(async (req, res) => {
      const productId = productIdSchema.parse(req.params.productId);
      const room = deps.registry.find(productId);
      if (!room) {
        throw new AppError(`No live room for ${productId}`, 404, "NOT_FOUND");
      }
      const snapshot = await room.snapshot();
      res.json(serializeSnapshot(snapshot));
    })
  );

  router.post(
    "/rooms/:productId/close",
    adminLimiter,
    adminGuard,
    asyncHandler(async (req, res) => {
      const productId = productIdSchema.parse(req.params.productId);
      const result = await deps.closeAuction.execute(productId);
      res.json({ closed: result.closed, room: serializeSnapshot(result.snapshot) });
    })
  );

  return router;
}
