import { Bid } from "./bid";

export type CloseReason = "ended" | "admin";

export type RoomEvent =
  | { type: "bid:accepted"; productId: string; eventId: number; bid: Bid; currentHighest: number }
  | { type: "auction:opened"; productId: string; eventId: number; at: Date; currentHighest: number | null }
  | {
      type: "auction:closed";
      productId: string;
      eventId: number;
      at: Date;
      reason: CloseReason;
      winningBid: Bid | null;
      currentHighest: number | null;
    };
