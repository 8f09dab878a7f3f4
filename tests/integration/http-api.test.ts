import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import supertest from "supertest";
import { createApp } from "../../src/presentation/http/app";
import { RoomRegistry } from "../../src/application/rooms/roomRegistry";
import { CloseAuctionUseCase } from "../../src/application/usecases/closeAuction";
import {
  createMockStorage,
  createMockAuctionRepository,
  createMockBidRepository,
  seedAuction,
  MockStorage
} from "../mocks/repositories";
import {
  createInMemoryRateLimitCounter,
  createManualRoomTimer,
  createMockBidRecorder
} from "../mocks/services";
import { FakeConnection } from "../mocks/connections";

const adminToken = "test-admin-token";

describe("HTTP API", () => {
  let storage: MockStorage;
  let registry: RoomRegistry;
  let counter: ReturnType<typeof createInMemoryRateLimitCounter>;
  let request: ReturnType<typeof supertest>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    storage = createMockStorage();
    registry = new RoomRegistry(
      createMockAuctionRepository(storage),
      createMockBidRepository(storage),
      createMockBidRecorder(),
      createManualRoomTimer(),
      {
        mailboxCapacity: 100,
        submitTimeoutMs: 1000,
        recentBidsLimit: 10,
        subscriberQueueLimit: 16,
        sendTimeoutMs: 1000
      }
    );
    counter = createInMemoryRateLimitCounter();
    const app = createApp(
      {
        registry,
        closeAuction: new CloseAuctionUseCase(registry),
        rateLimitCounter: counter,
        adminToken,
        adminRateLimit: { windowMs: 60_000, maxRequests: 3 }
      },
      "*"
    );
    request = supertest(app);
  });

  afterEach(() => {
    registry.shutdown();
    vi.restoreAllMocks();
  });

  describe("GET /api/health", () => {
    it("reports the number of live rooms", async () => {
      const auction = seedAuction(storage);
      await registry.getOrCreateRoom(auction.productId);

      const res = await request.get("/api/health");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "ok", rooms: 1, time: expect.any(String) });
    });
  });

  describe("GET /api/rooms", () => {
    it("lists live rooms with their subscriber counts", async () => {
      const auction = seedAuction(storage);
      const room = await registry.getOrCreateRoom(auction.productId);
      await room.attach(new FakeConnection("c-1", auction.productId));

      const res = await request.get("/api/rooms");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        rooms: [{ productId: auction.productId, status: "open", subscriberCount: 1 }]
      });
    });
  });

  describe("GET /api/rooms/:productId", () => {
    it("returns the serialized snapshot", async () => {
      const auction = seedAuction(storage, { title: "Brass lamp", basePrice: 40 });
      const room = await registry.getOrCreateRoom(auction.productId);
      await room.submitBid("alice", 55);

      const res = await request.get(`/api/rooms/${auction.productId}`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        productId: auction.productId,
        title: "Brass lamp",
        status: "open",
        basePrice: 40,
        startTime: auction.startTime.toISOString(),
        endTime: auction.endTime.toISOString(),
        highestBid: { bidder: "alice", amount: 55, sequence: 1 },
        minimumBid: 56,
        subscriberCount: 0,
        lastEventId: 1
      });
      expect(res.body.recentBids).toHaveLength(1);
    });

    it("returns 404 when no room is live", async () => {
      const res = await request.get("/api/rooms/absent");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "NOT_FOUND", message: "No live room for absent" });
    });

    it("rejects a blank product id", async () => {
      const res = await request.get("/api/rooms/%20%20");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("VALIDATION_ERROR");
    });
  });

  describe("POST /api/rooms/:productId/close", () => {
    it("requires the admin token", async () => {
      const auction = seedAuction(storage);
      await registry.getOrCreateRoom(auction.productId);

      const res = await request.post(`/api/rooms/${auction.productId}/close`).set("x-admin-token", "wrong");

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: "UNAUTHORIZED", message: "Invalid admin token" });
      expect(registry.find(auction.productId)?.status).toBe("open");
    });

    it("closes the room and notifies subscribers", async () => {
      const auction = seedAuction(storage);
      const room = await registry.getOrCreateRoom(auction.productId);
      const watcher = new FakeConnection("c-1", auction.productId);
      await room.attach(watcher);
      await room.submitBid("bob", 500);

      const res = await request.post(`/api/rooms/${auction.productId}/close`).set("x-admin-token", adminToken);
      await room.idle();

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        closed: true,
        room: { status: "closed", highestBid: { bidder: "bob", amount: 500 } }
      });
      expect(watcher.eventTypes()).toEqual(["bid:accepted", "auction:closed"]);
    });

    it("reports closed=false when the room was already closed", async () => {
      const auction = seedAuction(storage);
      const room = await registry.getOrCreateRoom(auction.productId);
      await room.attach(new FakeConnection("c-1", auction.productId));
      await room.close("admin");

      const res = await request.post(`/api/rooms/${auction.productId}/close`).set("x-admin-token", adminToken);

      expect(res.status).toBe(200);
      expect(res.body.closed).toBe(false);
    });

    it("returns 404 for a product without a live room", async () => {
      const res = await request.post("/api/rooms/absent/close").set("x-admin-token", adminToken);

      expect(res.status).toBe(404);
      expect(res.body.error).toBe("NOT_FOUND");
    });

    it("rate limits admin calls", async () => {
      const statuses: number[] = [];
      for (let i = 0; i < 4; i += 1) {
        const res = await request.post("/api/rooms/absent/close").set("x-admin-token", adminToken);
        statuses.push(res.status);
      }

      expect(statuses).toEqual([404, 404, 404, 429]);
      expect(counter.hit).toHaveBeenCalledTimes(4);
    });

    it("lets requests through when the counter store fails", async () => {
      counter.hit.mockRejectedValueOnce(new Error("store offline"));

      const res = await request.post("/api/rooms/absent/close").set("x-admin-token", adminToken);

      expect(res.status).toBe(404);
    });
  });
});
