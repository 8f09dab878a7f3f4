export interface Bid {
  productId: string;
  bidderId: string;
  amount: number;
  timestamp: Date;
  sequence: number;
}
