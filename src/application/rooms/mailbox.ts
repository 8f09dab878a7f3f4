import { AppError } from "../errors";

export type MailboxOptions = {
  /** Maximum number of bounded tasks waiting to run. */
  capacity: number;
  /** How long a bounded task may wait before it is abandoned. */
  waitTimeoutMs: number;
};

type Envelope = {
  run: () => void | Promise<void>;
  fail: (error: Error) => void;
  bounded: boolean;
  timer: NodeJS.Timeout | null;
};

export class MailboxUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503, "ROOM_UNAVAILABLE");
  }
}

/**
 * Single-consumer FIFO of tasks. Tasks run strictly one after another, so state they
 * touch needs no further locking. Only bounded tasks count towards capacity and can
 * time out while queued.
 */
export class Mailbox {
  private readonly queue: Envelope[] = [];
  private boundedPending = 0;
  private closed = false;
  private draining: Promise<void> | null = null;

  constructor(private readonly options: MailboxOptions) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.draining !== null;
  }

  post<T>(task: () => T | Promise<T>, opts: { bounded?: boolean } = {}): Promise<T> {
    const bounded = opts.bounded ?? false;
    if (this.closed) {
      return Promise.reject(new MailboxUnavailableError("Mailbox is closed"));
    }
    if (bounded && this.boundedPending >= this.options.capacity) {
      return Promise.reject(new MailboxUnavailableError("Mailbox is full"));
    }

    return new Promise<T>((resolve, reject) => {
      const envelope: Envelope = {
        bounded,
        timer: null,
        fail: reject,
        run: async () => {
          resolve(await task());
        }
      };
      if (bounded) {
        this.boundedPending += 1;
        envelope.timer = setTimeout(() => {
          const index = this.queue.indexOf(envelope);
          if (index >= 0) {
            this.queue.splice(index, 1);
            this.boundedPending -= 1;
            reject(new MailboxUnavailableError("Timed out waiting for the room"));
          }
        }, this.options.waitTimeoutMs);
      }
      this.queue.push(envelope);
      if (!this.draining) {
        this.draining = Promise.resolve().then(() => this.drain());
      }
    });
  }

  /** Rejects everything still queued; the task currently running is allowed to finish. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const abandoned = this.queue.splice(0, this.queue.length);
    this.boundedPending = 0;
    for (const envelope of abandoned) {
      if (envelope.timer) {
        clearTimeout(envelope.timer);
      }
      envelope.fail(new MailboxUnavailableError("Mailbox is closed"));
    }
  }

  /** Resolves once the queue is empty. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private async drain(): Promise<void> {
    let envelope = this.queue.shift();
    while (envelope) {
      if (envelope.timer) {
        clearTimeout(envelope.timer);
      }
      if (envelope.bounded) {
        this.boundedPending -= 1;
      }
      try {
        await envelope.run();
      } catch (error) {
        envelope.fail(error instanceof Error ? error : new Error(String(error)));
      }
      envelope = this.queue.shift();
    }
    this.draining = null;
  }
}
