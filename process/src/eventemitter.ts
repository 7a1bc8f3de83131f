import { type Operation, withResolvers } from "effection";
import type { EventEmitter } from "node:events";

/**
 * Create an {@link Operation} that yields the arguments of the next event
 * `eventName` emitted by `source`. The listener is removed as soon as the
 * operation completes or is halted.
 */
export function* once<TArgs extends unknown[] = unknown[]>(
  source: EventEmitter,
  eventName: string,
): Operation<TArgs> {
  const result = withResolvers<TArgs>();

  let listener = (...args: unknown[]) => {
    result.resolve(args as TArgs);
  };

  source.once(eventName, listener);

  try {
    return yield* result.operation;
  } finally {
    source.off(eventName, listener);
  }
}
