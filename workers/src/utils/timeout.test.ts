import { describe, it, expect, vi } from "vitest";
import { withTimeout } from "./timeout.js";

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")));
  });
}

describe("withTimeout", () => {
  it("should resolve with the task value", async () => {
    await expect(withTimeout(async () => "done", 1000)).resolves.toBe("done");
  });

  it("should reject when the deadline passes", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await expect(withTimeout(never, 10)).rejects.toThrow(
      "Timed out after 10ms",
    );
  });

  it("should abort the signal handed to the task on timeout", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    let seen: AbortSignal | undefined;
    await expect(
      withTimeout((signal) => {
        seen = signal;
        return never(signal);
      }, 10),
    ).rejects.toThrow();
    expect(seen?.aborted).toBe(true);
  });

  it("should reject with the parent reason when the parent aborts", async () => {
    const parent = new AbortController();
    const pending = withTimeout(
      () => new Promise<string>(() => {}),
      1000,
      parent.signal,
    );
    parent.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });

  it("should not run the task when the parent is already aborted", async () => {
    const parent = new AbortController();
    parent.abort(new Error("cancelled"));
    const run = vi.fn(async () => "never");

    await expect(withTimeout(run, 1000, parent.signal)).rejects.toThrow(
      "cancelled",
    );
    expect(run).not.toHaveBeenCalled();
  });

  it("should propagate a task failure", async () => {
    await expect(
      withTimeout(async () => {
        throw new Error("boom");
      }, 1000),
    ).rejects.toThrow("boom");
  });
});
