import { Queue, Worker } from "bullmq";
import { z } from "zod";
import { Bid } from "../../domain/entities/bid";
import { BidRecorder } from "../../application/ports/services";
import { env } from "../../config/env";
import { log, logError } from "../logging/logger";

// Use URL-based connection to avoid ioredis version mismatch with bullmq's internal ioredis
const connection = { url: env.REDIS_URL };

const RECORD_BID_QUEUE = "record-bid";

const recordBidJobSchema = z.object({
  productId: z.string().min(1),
  bidderId: z.string().min(1),
  amount: z.number().int().positive(),
  timestamp: z.string().datetime(),
  sequence: z.number().int().positive()
});

export type RecordBidJob = z.infer<typeof recordBidJobSchema>;

export function toRecordBidJob(bid: Bid): RecordBidJob {
  return {
    productId: bid.productId,
    bidderId: bid.bidderId,
    amount: bid.amount,
    timestamp: bid.timestamp.toISOString(),
    sequence: bid.sequence
  };
}

/**
 * Unique per acceptance. The product id is URI-encoded because BullMQ refuses custom ids
 * containing ":".
 */
export function recordBidJobId(bid: Bid): string {
  return `${encodeURIComponent(bid.productId)}-${bid.sequence}-${bid.timestamp.getTime()}`;
}

export function fromRecordBidJob(data: unknown): Bid {
  const job = recordBidJobSchema.parse(data);
  return { ...job, timestamp: new Date(job.timestamp) };
}

export class BullMqBidRecorder implements BidRecorder {
  private readonly queue = new Queue<RecordBidJob>(RECORD_BID_QUEUE, { connection });

  async recordBid(productId: string, bid: Bid): Promise<void> {
    await this.queue.add(RECORD_BID_QUEUE, toRecordBidJob(bid), {
      jobId: recordBidJobId(bid),
      attempts: 5,
      backoff: { type: "exponential", delay: 500 },
      removeOnComplete: true,
      removeOnFail: 1000
    });
  }

  // Failed jobs are included: their sequence numbers were handed out and must not be reused.
  async pendingBids(productId: string): Promise<Bid[]> {
    const jobs = await this.queue.getJobs(["wait", "prioritized", "delayed", "active", "paused", "failed"]);
    return jobs.filter((job) => job.data.productId === productId).map((job) => fromRecordBidJob(job.data));
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export function startRecordBidWorker(handler: (bid: Bid) => Promise<void>): Worker<RecordBidJob> {
  const worker = new Worker<RecordBidJob>(
    RECORD_BID_QUEUE,
    async (job) => {
      await handler(fromRecordBidJob(job.data));
    },
    { connection }
  );
  worker.on("failed", (job, error) => {
    logError("bid.persist_failed", error, {
      jobId: job?.id,
      attempts: job?.attemptsMade
    });
  });
  worker.on("completed", (job) => {
    log("debug", "bid.persisted", { jobId: job.id });
  });
  return worker;
}
