import type {
  HarnessConfig,
  Mode,
  Player,
  SolverResult,
  StatusVerdict,
  TextVerdict,
} from "../types.ts";

/**
 * What a solver left behind once it exited.
 */
export interface Capture {
  code: number | null;
  signal: string | null;
  /**
   * exactly the bytes the solver wrote
   */
  stdout: Buffer;
  stderr: string;
}

/**
 * How a verdict is read out of a finished solver. One strategy exists per
 * mode; the comparator never needs to know which one produced a result.
 */
export interface ExtractionStrategy {
  mode: Mode;
  extract(capture: Capture): SolverResult;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Readable form of a verdict. Output that is not valid UTF-8 is shown one
 * character per byte.
 */
export function displayText(raw: Buffer): string {
  try {
    return utf8.decode(raw);
  } catch {
    return raw.toString("latin1");
  }
}

/**
 * The verdict is every byte from the first occurrence of `marker` to the
 * end of stdout, or nothing when the marker never appears.
 */
export function extractText(stdout: Buffer, marker: string): {
  verdict: string;
  raw: Buffer;
  found: boolean;
} {
  let index = stdout.indexOf(marker, 0, "utf-8");
  if (index < 0) {
    return { verdict: "", raw: Buffer.alloc(0), found: false };
  }
  let raw = stdout.subarray(index);
  return { verdict: displayText(raw), raw, found: true };
}

export function textVerdict(marker: string): ExtractionStrategy {
  return {
    mode: "text",
    extract(capture): TextVerdict {
      return {
        kind: "text",
        ...extractText(capture.stdout, marker),
        code: capture.code,
      };
    },
  };
}

export function exitStatus(
  winners: Record<string, Player>,
): ExtractionStrategy {
  return {
    mode: "status",
    extract({ code, signal }): StatusVerdict {
      let winner = code !== null ? winners[String(code)] : undefined;
      return {
        kind: "status",
        code,
        signal,
        winner: winner ?? "unrecognized",
      };
    },
  };
}

export function strategyFor(
  config: Pick<HarnessConfig, "mode" | "marker" | "winners">,
): ExtractionStrategy {
  switch (config.mode) {
    case "text":
      return textVerdict(config.marker);
    case "status":
      return exitStatus(config.winners);
  }
}
