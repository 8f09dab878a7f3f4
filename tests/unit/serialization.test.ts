import { describe, it, expect, beforeAll } from "vitest";
import { Bid } from "../../src/domain/entities/bid";
import { serializeEvent, serializeOutcome } from "../../src/presentation/serialization";

process.env.MONGO_URI ??= "mongodb://localhost:27017/auction_rooms_test";
process.env.REDIS_URL ??= "redis://localhost:6379";

const bid: Bid = {
  productId: "lot-1",
  bidderId: "alice",
  amount: 250,
  timestamp: new Date("2030-05-01T09:30:00.000Z"),
  sequence: 4
};

describe("serialization", () => {
  it("renames the bidder and formats timestamps on accepted bids", () => {
    expect(
      serializeEvent({ type: "bid:accepted", productId: "lot-1", eventId: 7, bid, currentHighest: 250 })
    ).toEqual({
      type: "bid:accepted",
      productId: "lot-1",
      eventId: 7,
      currentHighest: 250,
      bid: {
        productId: "lot-1",
        bidder: "alice",
        amount: 250,
        timestamp: "2030-05-01T09:30:00.000Z",
        sequence: 4
      }
    });
  });

  it("serializes a close without a winner", () => {
    expect(
      serializeEvent({
        type: "auction:closed",
        productId: "lot-1",
        eventId: 1,
        at: new Date("2030-05-01T10:00:00.000Z"),
        reason: "ended",
        winningBid: null,
        currentHighest: null
      })
    ).toEqual({
      type: "auction:closed",
      productId: "lot-1",
      eventId: 1,
      at: "2030-05-01T10:00:00.000Z",
      reason: "ended",
      winningBid: null,
      currentHighest: null
    });
  });

  it("passes rejections through unchanged", () => {
    const rejected = {
      status: "rejected" as const,
      reason: "AMOUNT_TOO_LOW" as const,
      message: "Bid must be greater than 250",
      currentHighest: 250
    };
    expect(serializeOutcome(rejected)).toEqual(rejected);
    expect(serializeOutcome({ status: "accepted", bid })).toEqual({
      status: "accepted",
      bid: {
        productId: "lot-1",
        bidder: "alice",
        amount: 250,
        timestamp: "2030-05-01T09:30:00.000Z",
        sequence: 4
      }
    });
  });
});

describe("record-bid job payload", () => {
  let queue: typeof import("../../src/infrastructure/queue/bullmq");

  beforeAll(async () => {
    queue = await import("../../src/infrastructure/queue/bullmq");
  });

  it("carries a bid through the queue as plain JSON", () => {
    const job = queue.toRecordBidJob(bid);

    expect(job.timestamp).toBe("2030-05-01T09:30:00.000Z");
    expect(queue.fromRecordBidJob(JSON.parse(JSON.stringify(job)))).toEqual(bid);
  });

  it("builds a distinct job id per acceptance without a colon", () => {
    const product = { ...bid, productId: "catalog:lot 1" };
    const resequenced = { ...product, timestamp: new Date("2030-05-01T09:31:00.000Z") };

    expect(queue.recordBidJobId(product)).toBe(`catalog%3Alot%201-4-${product.timestamp.getTime()}`);
    expect(queue.recordBidJobId(product)).not.toContain(":");
    expect(queue.recordBidJobId(resequenced)).not.toBe(queue.recordBidJobId(product));
  });

  it("refuses a malformed payload", () => {
    expect(() => queue.fromRecordBidJob({ productId: "lot-1", amount: -5 })).toThrow();
  });
});
