/**
 * Serial executor: one total order for every mutating operation.
 *
 * Tasks run one at a time, in submission order, each to completion before
 * the next starts. A rejected task rejects its own caller; the queue moves on.
 */

export interface SerialExecutor {
  /** Queue `task` behind everything already submitted. */
  run<T>(task: () => Promise<T>): Promise<T>;
  /** Tasks submitted but not yet settled. */
  pending(): number;
  /** Resolves once everything submitted so far has settled. */
  idle(): Promise<void>;
}

export function createSerialExecutor(): SerialExecutor {
  let tail: Promise<void> = Promise.resolve();
  let inFlight = 0;

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      inFlight++;
      const next = tail.then(task).finally(() => {
        inFlight--;
      });
      tail = next.then(
        () => undefined,
        () => undefined,
      );
      return next;
    },

    pending() {
      return inFlight;
    },

    idle() {
      return tail;
    },
  };
}
