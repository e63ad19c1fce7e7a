import { DeadlineExceededError } from "./errors";

/**
 * Race `work` against an abort signal. The work itself is not cancelled;
 * anything it already committed stays committed.
 */
export function withDeadline<T>(work: Promise<T>, signal: AbortSignal, label: string): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new DeadlineExceededError(`${label} exceeded its deadline`));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new DeadlineExceededError(`${label} exceeded its deadline`));
    signal.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
