import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(4000),
  MONGO_URI: z.string().min(1),
  REDIS_URL: z.string().min(1),
  CORS_ORIGIN: z.string().default("*"),
  ADMIN_TOKEN: z.string().optional().default(""),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  ROOM_MAILBOX_CAPACITY: z.coerce.number().int().positive().default(1024),
  ROOM_SUBMIT_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  ROOM_RECENT_BIDS_LIMIT: z.coerce.number().int().positive().default(20),
  SUBSCRIBER_QUEUE_LIMIT: z.coerce.number().int().positive().default(64),
  SUBSCRIBER_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ADMIN_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  ADMIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30)
});

export const env = EnvSchema.parse(process.env);
