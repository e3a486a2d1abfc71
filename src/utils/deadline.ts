export type Raced<T> =
  | { kind: "value"; value: T }
  | { kind: "timeout" }
  | { kind: "aborted" };

/**
 * Settle with whichever comes first: the work, the timeout or the abort signal.
 * A rejection of `work` before either deadline rejects the returned promise.
 * The work is not cancelled; callers that care attach their own cleanup.
 */
export function raceDeadline<T>(
  work: Promise<T>,
  opts: { timeoutMs?: number; signal?: AbortSignal }
): Promise<Raced<T>> {
  const { timeoutMs, signal } = opts;
  if (signal?.aborted) return Promise.resolve({ kind: "aborted" });

  return new Promise<Raced<T>>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const onAbort = () => {
      cleanup();
      resolve({ kind: "aborted" });
    };

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        resolve({ kind: "timeout" });
      }, timeoutMs);
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve({ kind: "value", value });
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

/**
 * AbortController that fires after `timeoutMs` or when `parent` aborts.
 * `dispose()` clears the timer and detaches from the parent.
 */
export function deadlineController(timeoutMs: number, parent?: AbortSignal) {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason ?? new Error("cancelled"));

  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/** Built-in fetch bounded by a timeout and an optional outer signal. */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  const deadline = deadlineController(timeoutMs, signal);
  try {
    return await fetch(url, { ...init, signal: deadline.signal });
  } finally {
    deadline.dispose();
  }
}

export function abortReason(signal: AbortSignal): string {
  const r: unknown = signal.reason;
  if (r instanceof Error) return r.message;
  return typeof r === "string" ? r : "aborted";
}
