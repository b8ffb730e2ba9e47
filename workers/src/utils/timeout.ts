/**
 * Runs an abortable task under a deadline.
 *
 * The task receives a signal that aborts when the deadline passes or when
 * the optional parent signal aborts; the returned promise rejects at that
 * moment even if the task ignores the signal.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw parent.reason instanceof Error ? parent.reason : new Error("Aborted");
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    const rejectWithReason = () =>
      reject(
        controller.signal.reason instanceof Error
          ? controller.signal.reason
          : new Error("Aborted"),
      );
    if (controller.signal.aborted) {
      rejectWithReason();
    } else {
      controller.signal.addEventListener("abort", rejectWithReason, {
        once: true,
      });
    }
  });

  try {
    const pending = run(controller.signal);
    // a task that rejects after losing the race must not surface as unhandled
    pending.catch((error: unknown) => {
      if (controller.signal.aborted) {
        console.warn(
          `[Timeout] Task settled after abort: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    });
    return await Promise.race([pending, aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
