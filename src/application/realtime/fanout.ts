import { RoomEvent } from "../../domain/entities/roomEvent";
import { ConnectionHandle } from "../ports/connection";
import { EvictionHandler, Subscriber, SubscriberOptions } from "./subscriber";

export class BroadcastFanout {
  private readonly subscribers = new Map<ConnectionHandle, Subscriber>();

  constructor(
    private readonly options: SubscriberOptions,
    private readonly onEvict: EvictionHandler
  ) {}

  get size(): number {
    return this.subscribers.size;
  }

  has(handle: ConnectionHandle): boolean {
    return this.subscribers.has(handle);
  }

  add(handle: ConnectionHandle): Subscriber {
    const existing = this.subscribers.get(handle);
    if (existing) {
      return existing;
    }
    const subscriber = new Subscriber(handle, this.options, this.onEvict);
    this.subscribers.set(handle, subscriber);
    return subscriber;
  }

  remove(handle: ConnectionHandle): boolean {
    const subscriber = this.subscribers.get(handle);
    if (!subscriber) {
      return false;
    }
    subscriber.stop();
    this.subscribers.delete(handle);
    return true;
  }

  /** Queues the event for every subscriber and returns how many took it. Never waits on a send. */
  publish(event: RoomEvent): number {
    let queued = 0;
    for (const subscriber of [...this.subscribers.values()]) {
      if (subscriber.push(event)) {
        queued += 1;
      }
    }
    return queued;
  }

  handles(): ConnectionHandle[] {
    return [...this.subscribers.keys()];
  }

  async idle(): Promise<void> {
    await Promise.all([...this.subscribers.values()].map((subscriber) => subscriber.idle()));
  }
}
