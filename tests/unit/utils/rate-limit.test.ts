import { describe, it, expect, vi } from "vitest";
import { callRateLimited } from "../../../src/utils/rate-limit.js";
import { rateLimitDelay } from "../../../src/utils/errors.js";
import type { Sleeper } from "../../../src/slack/types.js";
import { platformError, rateLimitError } from "../../helpers/fake-slack.js";

describe("callRateLimited", () => {
  it("sleeps for each Retry-After and returns the eventual result", async () => {
    const sleep = vi.fn<Sleeper>(async () => {});
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(rateLimitError(1))
      .mockRejectedValueOnce(rateLimitError(2))
      .mockResolvedValueOnce("done");

    await expect(callRateLimited(call, { sleep })).resolves.toBe("done");
    expect(call).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("reports every backoff with its attempt number", async () => {
    const onRateLimited = vi.fn();
    const call = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(rateLimitError(3))
      .mockResolvedValueOnce(7);

    await callRateLimited(call, { sleep: async () => {}, onRateLimited });
    expect(onRateLimited).toHaveBeenCalledWith(3, 1);
  });

  it("keeps retrying without a cap", async () => {
    const sleep = vi.fn<Sleeper>(async () => {});
    const call = vi.fn<() => Promise<string>>();
    for (let i = 0; i < 25; i++) {
      call.mockRejectedValueOnce(rateLimitError(1));
    }
    call.mockResolvedValueOnce("finally");

    await expect(callRateLimited(call, { sleep })).resolves.toBe("finally");
    expect(sleep).toHaveBeenCalledTimes(25);
  });

  it("propagates other errors without sleeping", async () => {
    const sleep = vi.fn<Sleeper>(async () => {});
    const error = platformError({ error: "channel_not_found" });
    const call = vi.fn<() => Promise<string>>().mockRejectedValueOnce(error);

    await expect(callRateLimited(call, { sleep })).rejects.toBe(error);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("honours a ratelimited platform answer carrying retry_after", async () => {
    const sleep = vi.fn<Sleeper>(async () => {});
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(platformError({ error: "ratelimited", retry_after: 4 }))
      .mockResolvedValueOnce("ok");

    await callRateLimited(call, { sleep });
    expect(sleep).toHaveBeenCalledWith(4000);
  });
});

describe("rateLimitDelay", () => {
  it("returns null for anything that is not a rate limit", () => {
    expect(rateLimitDelay(new Error("boom"))).toBeNull();
    expect(rateLimitDelay(platformError({ error: "ratelimited" }))).toBeNull();
    expect(rateLimitDelay("ratelimited")).toBeNull();
  });
});
