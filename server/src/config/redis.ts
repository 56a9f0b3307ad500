/** Redis connection used by the lease lock driver. Keys live under REDIS_NAMESPACE. */
import { createClient } from "redis";

import { env } from "./env.js";
import { logger } from "./logger.js";
import { errorMessage } from "../utils/http.js";

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

function getClient(): RedisClient {
  if (!client) {
    const useTls = env.REDIS_URL.startsWith("rediss://");

    client = createClient({
      url: env.REDIS_URL,
      socket: {
        tls: useTls,
        connectTimeout: 3000,
        keepAlive: 5000,
        reconnectStrategy: (retries) => {
          const delayMs = Math.min(retries * 200, 3000);
          logger.warn("redis.reconnecting", { retries, delayMs });
          return delayMs;
        },
      },
    });

    client.on("error", (e: unknown) => {
      logger.warn("redis.error", { message: errorMessage(e) });
    });

    client.on("ready", () => {
      logger.info("redis.ready", { namespace: env.REDIS_NAMESPACE });
    });
  }

  return client;
}

export async function redisClient(): Promise<RedisClient> {
  const c = getClient();
  if (!c.isOpen) await c.connect();
  return c;
}

export function key(...parts: Array<string | number>): string {
  return `${env.REDIS_NAMESPACE}:${parts.join(":")}`;
}

export async function pingRedis(): Promise<{ status: "ok" | "error"; message?: string }> {
  try {
    const c = await redisClient();
    await c.ping();
    return { status: "ok" };
  } catch (err) {
    return { status: "error", message: errorMessage(err) };
  }
}

export async function closeRedis() {
  if (client?.isOpen) await client.quit();
}
