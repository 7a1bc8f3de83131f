import { type Operation, spawn, type Task, withResolvers } from "effection";

export interface WorkerPool {
  readonly size: number;

  /**
   * Wait until fewer than `size` operations started by this pool are still
   * running, then start `op` in the current scope. The returned task can be
   * awaited in any order.
   */
  spawn<T>(op: () => Operation<T>): Operation<Task<T>>;
}

export function createWorkerPool(size: number): WorkerPool {
  let active = 0;
  let vacancies: Array<() => void> = [];

  return {
    size,
    *spawn<T>(op: () => Operation<T>): Operation<Task<T>> {
      while (active >= size) {
        let vacancy = withResolvers<void>();
        vacancies.push(vacancy.resolve);
        yield* vacancy.operation;
      }
      active++;
      return yield* spawn(function* () {
        try {
          return yield* op();
        } finally {
          active--;
          vacancies.shift()?.();
        }
      });
    },
  };
}
