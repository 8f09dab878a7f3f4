export type AuctionStatus = "pending" | "open" | "closed";

export interface Auction {
  productId: string;
  title: string;
  basePrice: number;
  startTime: Date;
  endTime: Date;
  /** Set once an administrator has closed the auction ahead of its end time. */
  closedAt?: Date | null;
}
