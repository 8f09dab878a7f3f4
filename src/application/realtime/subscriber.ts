import { RoomEvent } from "../../domain/entities/roomEvent";
import { ConnectionHandle, DisconnectReason } from "../ports/connection";

export type SubscriberOptions = {
  queueLimit: number;
  sendTimeoutMs: number;
};

export type EvictionHandler = (subscriber: Subscriber, reason: DisconnectReason, error?: unknown) => void;

class SendTimeoutError extends Error {
  constructor(ms: number) {
    super(`send did not settle within ${ms}ms`);
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new SendTimeoutError(ms)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Outbound side of one connection: a bounded queue drained by its own loop, so a stalled
 * transport only ever holds up itself. Overflow, a rejected send or a send that outlives
 * the timeout evicts the subscriber.
 */
export class Subscriber {
  private readonly queue: RoomEvent[] = [];
  private active = true;
  private flushing: Promise<void> | null = null;

  constructor(
    readonly handle: ConnectionHandle,
    private readonly options: SubscriberOptions,
    private readonly onEvict: EvictionHandler
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  get backlog(): number {
    return this.queue.length;
  }

  push(event: RoomEvent): boolean {
    if (!this.active) {
      return false;
    }
    if (this.queue.length >= this.options.queueLimit) {
      this.evict("slow_consumer");
      return false;
    }
    this.queue.push(event);
    if (!this.flushing) {
      this.flushing = Promise.resolve().then(() => this.flush());
    }
    return true;
  }

  /** Stops delivery without touching the handle. Pending events are discarded. */
  stop(): void {
    this.active = false;
    this.queue.length = 0;
  }

  evict(reason: DisconnectReason, error?: unknown): void {
    if (!this.active) {
      return;
    }
    this.stop();
    this.handle.close(reason);
    this.onEvict(this, reason, error);
  }

  async idle(): Promise<void> {
    while (this.flushing) {
      await this.flushing;
    }
  }

  private async flush(): Promise<void> {
    let event = this.queue.shift();
    while (event && this.active) {
      try {
        await withTimeout(this.handle.send(event), this.options.sendTimeoutMs);
      } catch (error) {
        this.evict(error instanceof SendTimeoutError ? "slow_consumer" : "send_failed", error);
        break;
      }
      event = this.queue.shift();
    }
    this.flushing = null;
  }
}
