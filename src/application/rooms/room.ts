import { Auction, AuctionStatus } from "../../domain/entities/auction";
import { Bid } from "../../domain/entities/bid";
import { CloseReason, RoomEvent } from "../../domain/entities/roomEvent";
import { statusAt } from "../../domain/services/auctionSchedule";
import { BidRejectionReason, checkBid, minimumAcceptable } from "../../domain/services/bidRules";
import { log, logError } from "../../infrastructure/logging/logger";
import { AppError } from "../errors";
import { ConnectionHandle, DisconnectReason } from "../ports/connection";
import { BidRecorder, CancelTimer, RoomTimer } from "../ports/services";
import { BroadcastFanout } from "../realtime/fanout";
import { Subscriber } from "../realtime/subscriber";
import { Mailbox, MailboxUnavailableError } from "./mailbox";

export type RoomOptions = {
  mailboxCapacity: number;
  submitTimeoutMs: number;
  recentBidsLimit: number;
  subscriberQueueLimit: number;
  sendTimeoutMs: number;
};

export type RoomDependencies = {
  timer: RoomTimer;
  recorder: BidRecorder;
  /** Called from inside the room once it is closed and has nobody attached. */
  onIdle?: (room: Room) => void;
  /** Called from inside the room when an administrator closes it ahead of its end time. */
  onAdminClose?: (room: Room, at: Date) => void;
};

export type RoomSnapshot = {
  productId: string;
  title: string;
  status: AuctionStatus;
  basePrice: number;
  startTime: Date;
  endTime: Date;
  highestBid: Bid | null;
  minimumBid: number;
  recentBids: Bid[];
  subscriberCount: number;
  lastEventId: number;
};

export type BidOutcome =
  | { status: "accepted"; bid: Bid }
  | {
      status: "rejected";
      reason: BidRejectionReason;
      message: string;
      currentHighest: number | null;
    };

export type CloseResult = {
  closed: boolean;
  snapshot: RoomSnapshot | null;
};

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type EventBody = DistributiveOmit<RoomEvent, "eventId">;

export class Room {
  readonly productId: string;
  private currentStatus: AuctionStatus;
  private highestBid: Bid | null = null;
  private readonly recentBids: Bid[] = [];
  private nextSequence = 1;
  private lastEventId = 0;
  private retired = false;
  private readonly mailbox: Mailbox;
  private readonly fanout: BroadcastFanout;
  private cancelTimers: CancelTimer[] = [];

  constructor(
    private readonly auction: Auction,
    private readonly deps: RoomDependencies,
    private readonly options: RoomOptions,
    history: Bid[] = []
  ) {
    this.productId = auction.productId;
    this.currentStatus = statusAt(auction, new Date());
    this.mailbox = new Mailbox({
      capacity: options.mailboxCapacity,
      waitTimeoutMs: options.submitTimeoutMs
    });
    this.fanout = new BroadcastFanout(
      { queueLimit: options.subscriberQueueLimit, sendTimeoutMs: options.sendTimeoutMs },
      (subscriber, reason, error) => this.handleEviction(subscriber, reason, error)
    );
    this.restore(history);
  }

  get status(): AuctionStatus {
    return this.currentStatus;
  }

  get subscriberCount(): number {
    return this.fanout.size;
  }

  get isRetired(): boolean {
    return this.retired;
  }

  /** Arms the start and end timers. */
  start(): void {
    if (this.currentStatus === "pending") {
      this.cancelTimers.push(this.deps.timer.schedule(this.auction.startTime, () => this.fireTimer("open")));
    }
    if (this.currentStatus !== "closed") {
      this.cancelTimers.push(this.deps.timer.schedule(this.auction.endTime, () => this.fireTimer("close")));
    }
  }

  attach(handle: ConnectionHandle): Promise<RoomSnapshot> {
    if (handle.productId !== this.productId) {
      return Promise.reject(
        new AppError(`Connection ${handle.id} belongs to ${handle.productId}`, 400, "WRONG_ROOM")
      );
    }
    return this.mailbox.post(() => {
      this.syncClock(new Date());
      this.fanout.add(handle);
      log("debug", "room.attached", {
        productId: this.productId,
        connectionId: handle.id,
        subscribers: this.fanout.size
      });
      return this.buildSnapshot();
    });
  }

  async detach(handle: ConnectionHandle, reason: DisconnectReason = "client"): Promise<boolean> {
    try {
      return await this.mailbox.post(() => {
        const removed = this.fanout.remove(handle);
        if (removed) {
          log("debug", "room.detached", {
            productId: this.productId,
            connectionId: handle.id,
            reason,
            subscribers: this.fanout.size
          });
          this.notifyIfIdle();
        }
        return removed;
      });
    } catch (error) {
      if (error instanceof MailboxUnavailableError) {
        return false;
      }
      throw error;
    }
  }

  async submitBid(bidderId: string | null, amount: number, via?: ConnectionHandle): Promise<BidOutcome> {
    try {
      return await this.mailbox.post(() => this.sequenceBid(bidderId, amount, via), { bounded: true });
    } catch (error) {
      if (error instanceof MailboxUnavailableError) {
        return {
          status: "rejected",
          reason: "ROOM_UNAVAILABLE",
          message: error.message,
          currentHighest: this.highestBid?.amount ?? null
        };
      }
      throw error;
    }
  }

  /**
   * Administrative close. `closed` is true only for the call that performed the transition;
   * `snapshot` is null when the room was already retired.
   */
  async close(reason: CloseReason = "admin"): Promise<CloseResult> {
    try {
      return await this.mailbox.post(() => {
        this.syncClock(new Date());
        const closed = this.closeNow(reason);
        return { closed, snapshot: this.buildSnapshot() };
      });
    } catch (error) {
      if (error instanceof MailboxUnavailableError) {
        return { closed: false, snapshot: null };
      }
      throw error;
    }
  }

  snapshot(): Promise<RoomSnapshot> {
    return this.mailbox.post(() => {
      this.syncClock(new Date());
      return this.buildSnapshot();
    });
  }

  /** Marks the room unusable when it is closed and empty. Later tasks fail with ROOM_UNAVAILABLE. */
  async retireIfIdle(): Promise<boolean> {
    try {
      return await this.mailbox.post(() => {
        if (this.retired || this.currentStatus !== "closed" || this.fanout.size > 0) {
          return false;
        }
        this.retired = true;
        this.disarm();
        this.mailbox.close();
        return true;
      });
    } catch (error) {
      if (error instanceof MailboxUnavailableError) {
        return false;
      }
      throw error;
    }
  }

  /** Immediate teardown for process shutdown; every attached connection is closed. */
  dispose(): void {
    this.retired = true;
    this.disarm();
    this.mailbox.close();
    for (const handle of this.fanout.handles()) {
      this.fanout.remove(handle);
      handle.close("room_closed");
    }
  }

  /** Resolves once no room task is queued and every subscriber has drained. */
  async idle(): Promise<void> {
    do {
      await this.mailbox.idle();
      await this.fanout.idle();
    } while (this.mailbox.busy);
  }

  private sequenceBid(bidderId: string | null, amount: number, via?: ConnectionHandle): BidOutcome {
    this.syncClock(new Date());
    const check = checkBid({
      status: this.currentStatus,
      basePrice: this.auction.basePrice,
      highestBid: this.highestBid,
      bidderId,
      attached: via ? this.fanout.has(via) : true,
      amount
    });
    if (!check.accepted) {
      return {
        status: "rejected",
        reason: check.reason,
        message: check.message,
        currentHighest: this.highestBid?.amount ?? null
      };
    }

    const bid: Bid = {
      productId: this.productId,
      bidderId: check.bidderId,
      amount,
      timestamp: new Date(),
      sequence: this.nextSequence
    };
    this.nextSequence += 1;
    this.highestBid = bid;
    this.recentBids.push(bid);
    if (this.recentBids.length > this.options.recentBidsLimit) {
      this.recentBids.splice(0, this.recentBids.length - this.options.recentBidsLimit);
    }

    this.publish({ type: "bid:accepted", productId: this.productId, bid, currentHighest: bid.amount });
    log("debug", "bid.accepted", {
      productId: this.productId,
      bidderId: bid.bidderId,
      amount,
      sequence: bid.sequence
    });

    this.deps.recorder.recordBid(this.productId, bid).catch((error: unknown) => {
      logError("bid.record_failed", error, { productId: this.productId, sequence: bid.sequence });
    });

    return { status: "accepted", bid };
  }

  private syncClock(now: Date): void {
    if (this.currentStatus === "pending" && now.getTime() >= this.auction.startTime.getTime()) {
      this.openNow();
    }
    if (this.currentStatus !== "closed" && now.getTime() >= this.auction.endTime.getTime()) {
      this.closeNow("ended");
    }
  }

  private openNow(): boolean {
    if (this.currentStatus !== "pending") {
      return false;
    }
    this.currentStatus = "open";
    this.publish({
      type: "auction:opened",
      productId: this.productId,
      at: new Date(),
      currentHighest: this.highestBid?.amount ?? null
    });
    log("info", "auction.opened", { productId: this.productId });
    return true;
  }

  private closeNow(reason: CloseReason): boolean {
    if (this.currentStatus === "closed") {
      return false;
    }
    const at = new Date();
    this.currentStatus = "closed";
    this.disarm();
    this.publish({
      type: "auction:closed",
      productId: this.productId,
      at,
      reason,
      winningBid: this.highestBid,
      currentHighest: this.highestBid?.amount ?? null
    });
    log("info", "auction.closed", {
      productId: this.productId,
      reason,
      winningAmount: this.highestBid?.amount ?? null,
      subscribers: this.fanout.size
    });
    if (reason === "admin") {
      this.deps.onAdminClose?.(this, at);
    }
    this.notifyIfIdle();
    return true;
  }

  private fireTimer(kind: "open" | "close"): void {
    this.mailbox
      .post(() => (kind === "open" ? this.openNow() : this.closeNow("ended")))
      .catch((error: unknown) => {
        if (!(error instanceof MailboxUnavailableError)) {
          logError("room.timer_failed", error, { productId: this.productId, kind });
        }
      });
  }

  private publish(body: EventBody): void {
    this.lastEventId += 1;
    const event: RoomEvent = { ...body, eventId: this.lastEventId };
    this.fanout.publish(event);
  }

  private notifyIfIdle(): void {
    if (this.currentStatus === "closed" && this.fanout.size === 0 && !this.retired) {
      this.deps.onIdle?.(this);
    }
  }

  private handleEviction(subscriber: Subscriber, reason: DisconnectReason, error?: unknown): void {
    log("warn", "room.subscriber_evicted", {
      productId: this.productId,
      connectionId: subscriber.handle.id,
      reason,
      error: error instanceof Error ? error.message : undefined
    });
    this.detach(subscriber.handle, reason).catch((detachError: unknown) => {
      logError("room.detach_failed", detachError, { productId: this.productId });
    });
  }

  private disarm(): void {
    for (const cancel of this.cancelTimers) {
      cancel();
    }
    this.cancelTimers = [];
  }

  private restore(history: Bid[]): void {
    if (history.length === 0) {
      return;
    }
    const ordered = [...history].sort((a, b) => a.sequence - b.sequence);
    const last = ordered[ordered.length - 1];
    this.highestBid = last;
    this.nextSequence = last.sequence + 1;
    this.recentBids.push(...ordered.slice(-this.options.recentBidsLimit));
  }

  private buildSnapshot(): RoomSnapshot {
    return {
      productId: this.productId,
      title: this.auction.title,
      status: this.currentStatus,
      basePrice: this.auction.basePrice,
      startTime: this.auction.startTime,
      endTime: this.auction.endTime,
      highestBid: this.highestBid,
      minimumBid: minimumAcceptable(this.auction.basePrice, this.highestBid),
      recentBids: [...this.recentBids],
      subscriberCount: this.fanout.size,
      lastEventId: this.lastEventId
    };
  }
}
