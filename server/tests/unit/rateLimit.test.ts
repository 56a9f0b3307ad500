import { describe, expect, it } from "vitest";

import { fixedWindow } from "../../src/middlewares/rateLimit.js";

describe("fixedWindow", () => {
  it("limits after max hits and resets with the window", () => {
    let t = 1_000_000;
    const window = fixedWindow({ windowMs: 10_000, max: 2, now: () => t });

    expect(window.hit("1.2.3.4")).toEqual({ limited: false, remaining: 1, resetAt: 1_010_000, retryAfterSec: 10 });
    expect(window.hit("1.2.3.4").limited).toBe(false);
    t += 4_000;
    expect(window.hit("1.2.3.4")).toEqual({ limited: true, remaining: 0, resetAt: 1_010_000, retryAfterSec: 6 });
    expect(window.hit("5.6.7.8").limited).toBe(false);

    t = 1_010_000;
    expect(window.hit("1.2.3.4")).toEqual({ limited: false, remaining: 1, resetAt: 1_020_000, retryAfterSec: 10 });
  });
});
