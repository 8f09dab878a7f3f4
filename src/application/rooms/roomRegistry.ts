import { Auction, AuctionStatus } from "../../domain/entities/auction";
import { Bid } from "../../domain/entities/bid";
import { hasValidWindow } from "../../domain/services/auctionSchedule";
import { log, logError } from "../../infrastructure/logging/logger";
import { AppError, auctionNotFound } from "../errors";
import { AuctionRepository, BidRepository } from "../ports/repositories";
import { BidRecorder, RoomTimer } from "../ports/services";
import { Room, RoomOptions } from "./room";

/** Stored bids plus those still queued for write-behind, newest first, one entry per sequence. */
function mergeHistory(stored: Bid[], queued: Bid[], limit: number): Bid[] {
  const bySequence = new Map<number, Bid>();
  for (const bid of [...stored, ...queued]) {
    if (!bySequence.has(bid.sequence)) {
      bySequence.set(bid.sequence, bid);
    }
  }
  return [...bySequence.values()].sort((a, b) => b.sequence - a.sequence).slice(0, limit);
}

export type RoomSummary = {
  productId: string;
  status: AuctionStatus;
  subscriberCount: number;
};

/**
 * Process-wide productId -> Room map. Creation is create-or-get: concurrent first callers for
 * one product share a single in-flight creation, so at most one live Room exists per product.
 */
export class RoomRegistry {
  private readonly rooms = new Map<string, Room>();
  private readonly creating = new Map<string, Promise<Room>>();
  // Admin closes seen by this process, so a rebuilt room stays closed before the store catches up.
  private readonly adminClosed = new Map<string, Date>();

  constructor(
    private readonly auctions: AuctionRepository,
    private readonly bids: BidRepository,
    private readonly recorder: BidRecorder,
    private readonly timer: RoomTimer,
    private readonly roomOptions: RoomOptions
  ) {}

  get size(): number {
    return this.rooms.size;
  }

  find(productId: string): Room | undefined {
    const room = this.rooms.get(productId);
    return room && !room.isRetired ? room : undefined;
  }

  getOrCreateRoom(productId: string, metadata?: Auction): Promise<Room> {
    const existing = this.find(productId);
    if (existing) {
      return Promise.resolve(existing);
    }
    const inFlight = this.creating.get(productId);
    if (inFlight) {
      return inFlight;
    }
    const creation = this.createRoom(productId, metadata).finally(() => {
      this.creating.delete(productId);
    });
    this.creating.set(productId, creation);
    return creation;
  }

  /** Drops the room when it is closed and nobody is attached; otherwise does nothing. */
  async releaseIfEmpty(productId: string): Promise<boolean> {
    const room = this.rooms.get(productId);
    if (!room) {
      return false;
    }
    const retired = await room.retireIfIdle();
    if (!retired && !room.isRetired) {
      return false;
    }
    if (this.rooms.get(productId) === room) {
      this.rooms.delete(productId);
      log("info", "room.released", { productId });
      return true;
    }
    return false;
  }

  stats(): RoomSummary[] {
    return [...this.rooms.values()]
      .filter((room) => !room.isRetired)
      .map((room) => ({
        productId: room.productId,
        status: room.status,
        subscriberCount: room.subscriberCount
      }));
  }

  shutdown(): void {
    for (const room of this.rooms.values()) {
      room.dispose();
    }
    this.rooms.clear();
  }

  private async createRoom(productId: string, metadata?: Auction): Promise<Room> {
    const auction = metadata ?? (await this.auctions.findByProductId(productId));
    if (!auction) {
      throw auctionNotFound(productId);
    }
    if (!hasValidWindow(auction) || auction.basePrice < 0) {
      throw new AppError(`Auction ${productId} has an invalid schedule or price`, 422, "INVALID_AUCTION");
    }
    const limit = this.roomOptions.recentBidsLimit;
    const [stored, queued] = await Promise.all([
      this.bids.findLatestByProduct(productId, limit),
      this.recorder.pendingBids(productId)
    ]);
    const history = mergeHistory(stored, queued, limit);
    const closedAt = this.adminClosed.get(productId) ?? auction.closedAt ?? null;

    const room = new Room(
      { ...auction, closedAt },
      {
        timer: this.timer,
        recorder: this.recorder,
        onIdle: (idle) => {
          this.releaseIfEmpty(idle.productId).catch((error: unknown) => {
            logError("room.release_failed", error, { productId: idle.productId });
          });
        },
        onAdminClose: (closed, at) => this.recordAdminClose(closed.productId, at)
      },
      this.roomOptions,
      history
    );
    this.rooms.set(productId, room);
    room.start();
    log("info", "room.created", {
      productId,
      status: room.status,
      restoredBids: history.length
    });
    return room;
  }

  private recordAdminClose(productId: string, at: Date): void {
    if (!this.adminClosed.has(productId)) {
      this.adminClosed.set(productId, at);
    }
    this.auctions.markClosed(productId, at).catch((error: unknown) => {
      logError("auction.close_persist_failed", error, { productId });
    });
  }
}
