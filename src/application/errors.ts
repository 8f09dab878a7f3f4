export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number = 400,
    public readonly code: string = "BAD_REQUEST"
  ) {
    super(message);
  }
}

export function roomUnavailable(productId: string): AppError {
  return new AppError(`Room ${productId} is unavailable`, 503, "ROOM_UNAVAILABLE");
}

export function auctionNotFound(productId: string): AppError {
  return new AppError(`Auction ${productId} not found`, 404, "NOT_FOUND");
}
