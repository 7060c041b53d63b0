import { z } from "zod";

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();

const memoryBackend = z.object({ type: z.literal("memory") });

const redisBackend = z.object({
  type: z.literal("redis"),
  url: z.string().url().optional(),
  blockTimeoutMs: positiveMs.optional(),
});

export const bridgeConfigSchema = z.object({
  port,
  host: z.string().min(1).optional(),

  // MQTT transport
  maxPacketSize: z.number().int().min(64).optional(),
  keepAliveGraceFactor: z.number().min(1).optional(),

  // Policy
  topicTemplate: z
    .string()
    .refine((v) => v.includes("{topic}"), "must contain {topic}")
    .optional(),
  allowAnonymous: z.boolean().optional(),
  credentials: z.record(z.string()).optional(),
  subscriptionPrefix: z.string().optional(),

  // Backend
  backend: z.discriminatedUnion("type", [memoryBackend, redisBackend]).optional(),
});

/** Shape of a JSON config file; every field is optional there. */
export const bridgeConfigFileSchema = bridgeConfigSchema.partial();
