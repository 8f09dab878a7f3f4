import { RoomEvent } from "../../domain/entities/roomEvent";

export type DisconnectReason = "client" | "slow_consumer" | "send_failed" | "room_closed";

/**
 * One subscriber's channel, owned by the transport. The room keeps only membership.
 * `send` may suspend until the transport has buffered the event.
 */
export interface ConnectionHandle {
  readonly id: string;
  readonly productId: string;
  readonly bidderId: string | null;
  send(event: RoomEvent): Promise<void>;
  close(reason: DisconnectReason): void;
}
