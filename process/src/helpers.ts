import { type Operation, resource } from "effection";
import type { Readable } from "node:stream";

/**
 * Output written to a stream so far.
 */
export interface Captured {
  readonly bytes: Buffer;
  /**
   * `bytes` decoded as UTF-8
   */
  readonly text: string;
}

/**
 * Accumulate everything `target` emits for as long as the current scope is
 * alive. The bytes are kept exactly as written; `text` is only a view of
 * them.
 */
export function useCaptured(target: Readable): Operation<Captured> {
  return resource(function* (provide) {
    let chunks: Buffer[] = [];

    let onData = (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    };

    target.on("data", onData);

    try {
      yield* provide({
        get bytes() {
          if (chunks.length > 1) {
            chunks = [Buffer.concat(chunks)];
          }
          return chunks[0] ?? Buffer.alloc(0);
        },
        get text() {
          return this.bytes.toString("utf-8");
        },
      });
    } finally {
      target.off("data", onData);
    }
  });
}
