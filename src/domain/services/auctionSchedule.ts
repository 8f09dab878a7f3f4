import { Auction, AuctionStatus } from "../entities/auction";

export function statusAt(
  auction: Pick<Auction, "startTime" | "endTime" | "closedAt">,
  now: Date
): AuctionStatus {
  if (auction.closedAt || now.getTime() >= auction.endTime.getTime()) {
    return "closed";
  }
  if (now.getTime() < auction.startTime.getTime()) {
    return "pending";
  }
  return "open";
}

export function hasValidWindow(auction: Pick<Auction, "startTime" | "endTime">): boolean {
  return auction.startTime.getTime() < auction.endTime.getTime();
}
