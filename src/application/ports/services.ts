import { Bid } from "../../domain/entities/bid";

export interface BidRecorder {
  recordBid(productId: string, bid: Bid): Promise<void>;
  /** Bids handed to recordBid that may not be durable yet. */
  pendingBids(productId: string): Promise<Bid[]>;
}

export type CancelTimer = () => void;

export interface RoomTimer {
  schedule(runAt: Date, handler: () => void): CancelTimer;
}

export interface RateLimitCounter {
  /** Increments the counter for key and returns the count inside the current window. */
  hit(key: string, windowSec: number): Promise<number>;
}
