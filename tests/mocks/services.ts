import { vi } from "vitest";
import { Bid } from "../../src/domain/entities/bid";
import { BidRecorder, RateLimitCounter, RoomTimer } from "../../src/application/ports/services";

export function createMockBidRecorder() {
  const recorded: Array<{ productId: string; bid: Bid }> = [];
  return {
    _recorded: recorded,
    recordBid: vi.fn(async (productId: string, bid: Bid) => {
      recorded.push({ productId, bid });
    }),
    // Nothing is ever flushed, so every recorded bid counts as pending.
    pendingBids: vi.fn(async (productId: string) =>
      recorded.filter((entry) => entry.productId === productId).map((entry) => entry.bid)
    )
  } satisfies BidRecorder & { _recorded: unknown };
}

type ScheduledTimer = {
  runAt: Date;
  handler: () => void;
  cancelled: boolean;
};

// Timers that only fire when the test says so
export function createManualRoomTimer() {
  const scheduled: ScheduledTimer[] = [];
  return {
    _scheduled: scheduled,
    schedule: vi.fn((runAt: Date, handler: () => void) => {
      const entry: ScheduledTimer = { runAt, handler, cancelled: false };
      scheduled.push(entry);
      return () => {
        entry.cancelled = true;
      };
    }),
    fireAll() {
      for (const entry of scheduled) {
        if (!entry.cancelled) {
          entry.handler();
        }
      }
    },
    active(): ScheduledTimer[] {
      return scheduled.filter((entry) => !entry.cancelled);
    }
  } satisfies RoomTimer & { _scheduled: unknown; fireAll: unknown; active: unknown };
}

export function createInMemoryRateLimitCounter() {
  const counts = new Map<string, number>();
  return {
    _counts: counts,
    hit: vi.fn(async (key: string, _windowSec: number) => {
      const next = (counts.get(key) ?? 0) + 1;
      counts.set(key, next);
      return next;
    })
  } satisfies RateLimitCounter & { _counts: unknown };
}
