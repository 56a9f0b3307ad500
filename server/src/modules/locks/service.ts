import { randomUUID } from "crypto";

import { logger } from "../../config/logger.js";
import type { RedisClient } from "../../config/redis.js";
import { fail, type Busy, type EngineFailure, type Result } from "../../domain/result.js";
import { errorMessage } from "../../utils/http.js";

/** Raised when a vehicle's critical section cannot be entered before the wait deadline. */
export class LockTimeoutError extends Error {
  readonly code = "LOCK_TIMEOUT";

  constructor(
    readonly lockKey: string,
    readonly waitedMs: number
  ) {
    super(`Timed out after ${waitedMs}ms waiting for lock ${lockKey}`);
    this.name = "LockTimeoutError";
  }
}

/** Per-key mutual exclusion. Different keys never wait on each other. */
export interface VehicleLock {
  /** Wait budget, surfaced to callers as a retry hint. */
  readonly waitMs: number;
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

type Waiter = { grant: () => void; timer: NodeJS.Timeout | null };

/**
 * In-process keyed FIFO mutex. Correct only when a single process owns the store writes.
 */
export class LocalVehicleLock implements VehicleLock {
  private readonly held = new Set<string>();
  private readonly queues = new Map<string, Waiter[]>();

  constructor(readonly waitMs = 3_000) {}

  private acquire(key: string): Promise<void> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const queue = this.queues.get(key) ?? [];
      const waiter: Waiter = { grant: resolve, timer: null };
      waiter.timer = setTimeout(() => {
        const q = this.queues.get(key);
        const i = q ? q.indexOf(waiter) : -1;
        if (q && i !== -1) q.splice(i, 1);
        reject(new LockTimeoutError(key, this.waitMs));
      }, this.waitMs);
      queue.push(waiter);
      this.queues.set(key, queue);
    });
  }

  private release(key: string) {
    const queue = this.queues.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.queues.delete(key);
    if (!next) {
      this.held.delete(key);
      return;
    }
    // ownership passes straight to the next waiter; the key stays held
    if (next.timer) clearTimeout(next.timer);
    next.grant();
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  /** Keys currently held (diagnostics/tests). */
  heldKeys(): string[] {
    return [...this.held];
  }
}

/** Minimal lease store; Redis in production, a Map in tests. */
export interface LeaseStore {
  /** Set key=token only if absent, expiring after ttlMs. True when acquired. */
  tryAcquire(key: string, token: string, ttlMs: number): Promise<boolean>;
  /** Delete key only if it still holds token. */
  release(key: string, token: string): Promise<void>;
}

const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export function redisLeaseStore(client: RedisClient): LeaseStore {
  return {
    async tryAcquire(key, token, ttlMs) {
      const res = await client.set(key, token, { NX: true, PX: ttlMs });
      return res !== null;
    },
    async release(key, token) {
      await client.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
    },
  };
}

export type LeaseLockOptions = {
  keyFor?: (key: string) => string;
  ttlMs?: number; // lease lifetime; must exceed the longest critical section
  waitMs?: number;
  retryMs?: number;
};

/**
 * Cross-process lock on top of a lease store (SET NX PX + polling).
 * Each holder writes a random token, so an expired-and-reacquired lease is never released by
 * the previous holder.
 */
export class LeaseVehicleLock implements VehicleLock {
  readonly waitMs: number;
  private readonly ttlMs: number;
  private readonly retryMs: number;
  private readonly keyFor: (key: string) => string;

  constructor(
    private readonly store: LeaseStore,
    opts: LeaseLockOptions = {}
  ) {
    this.ttlMs = opts.ttlMs ?? 10_000;
    this.waitMs = opts.waitMs ?? 3_000;
    this.retryMs = opts.retryMs ?? 50;
    this.keyFor = opts.keyFor ?? ((k) => `lock:${k}`);
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lockKey = this.keyFor(key);
    const token = randomUUID();
    const started = Date.now();

    while (!(await this.store.tryAcquire(lockKey, token, this.ttlMs))) {
      const waited = Date.now() - started;
      if (waited >= this.waitMs) throw new LockTimeoutError(lockKey, waited);
      await sleep(Math.min(this.retryMs, this.waitMs - waited));
    }

    try {
      return await fn();
    } finally {
      // an unreleased lease lapses after ttlMs
      await this.store.release(lockKey, token).catch((err: unknown) => {
        logger.warn("lock.release_failed", { lockKey, message: errorMessage(err) });
      });
    }
  }
}

/** Runs `fn` in the vehicle's critical section; a lock timeout comes back as Busy. */
export async function serializeOnVehicle<T, E extends EngineFailure>(
  lock: VehicleLock,
  vehicleId: string,
  fn: () => Promise<Result<T, E>>
): Promise<Result<T, E | Busy>> {
  try {
    return await lock.withLock(vehicleId, fn);
  } catch (err) {
    if (!(err instanceof LockTimeoutError)) throw err;
    logger.warn("vehicle.busy", { vehicleId, waitedMs: err.waitedMs });
    return fail({
      kind: "Busy",
      retryAfterMs: lock.waitMs,
      message: `Vehicle ${vehicleId} is busy, retry shortly`,
    });
  }
}
