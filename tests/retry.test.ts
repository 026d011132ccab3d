import { describe, expect, it, vi } from "vitest";
import { MalformedPayloadError, TransientSourceError } from "../src/common/errors";
import { withRetry } from "../src/common/retry";
import { captureLogs } from "./support/logs";

describe("withRetry", () => {
  const logs = captureLogs();
  const sleep = vi.fn(async (_ms: number) => undefined);

  it("retries transient failures until one succeeds", async () => {
    sleep.mockClear();
    let calls = 0;
    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new TransientSourceError("timeout");
        return "ok";
      },
      { attempts: 5, backoffMs: 200, label: "demo fetch", logger: logs.logger, sleep }
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[200], [200]]);
    expect(logs.messages("warn")).toEqual([
      "Attempt 1 of demo fetch failed; retrying",
      "Attempt 2 of demo fetch failed; retrying",
    ]);
  });

  it("rethrows the last error when attempts run out", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new TransientSourceError(`timeout ${calls}`);
        },
        { attempts: 3, backoffMs: 0, label: "demo", logger: logs.logger, sleep }
      )
    ).rejects.toThrow("timeout 3");
    expect(calls).toBe(3);
  });

  it("does not retry errors the predicate rejects", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new MalformedPayloadError("bad json");
        },
        { attempts: 4, backoffMs: 0, label: "demo", logger: logs.logger, sleep }
      )
    ).rejects.toBeInstanceOf(MalformedPayloadError);
    expect(calls).toBe(1);
  });

  it("always makes at least one attempt", async () => {
    const fn = vi.fn(async () => 7);
    await expect(
      withRetry(fn, { attempts: 0, backoffMs: 0, label: "demo", logger: logs.logger, sleep })
    ).resolves.toBe(7);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
