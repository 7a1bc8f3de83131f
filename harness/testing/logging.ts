import type { Operation } from "effection";
import { loggerApi } from "../logger.ts";

const levels = ["error", "warn", "info", "debug"] as const;

type Level = (typeof levels)[number];

export interface LogEvent {
  type: Level;
  message: string;
}

/**
 * Keep log output of the current scope off the console. Messages at
 * `level` or more severe are recorded in the returned array, everything
 * else is dropped; `false` drops everything.
 */
export function* setupLogging(level: Level | false): Operation<LogEvent[]> {
  const events: LogEvent[] = [];
  const threshold = level === false ? -1 : levels.indexOf(level);

  function* record(type: Level, message: string): Operation<void> {
    if (levels.indexOf(type) <= threshold) {
      events.push({ type, message });
    }
  }

  yield* loggerApi.around({
    *info([message]) {
      yield* record("info", message);
    },
    *warn([message]) {
      yield* record("warn", message);
    },
    *debug([message]) {
      yield* record("debug", message);
    },
    *error([message]) {
      yield* record("error", message);
    },
  });

  return events;
}
