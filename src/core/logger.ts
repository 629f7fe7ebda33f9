import { redactSensitiveInfo, sanitizeLogMessage } from "./security.js";
import type { Finding, StageId } from "../types/report.js";

export type OutputFormat = "human" | "jsonl";

export interface Logger {
  stage(stage: StageId, step: number, message: string): void;
  finding(f: Finding): void;
  info(message: string): void;
  warn(message: string): void;
}

export const silentLogger: Logger = {
  stage: () => undefined,
  finding: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

const LEVEL_MARK: Record<Finding["level"], string> = {
  error: "❌",
  warn: "⚠️ ",
  info: "✅",
};

type Writable = { write(chunk: string): unknown };

function clean(message: string): string {
  return sanitizeLogMessage(redactSensitiveInfo(message));
}

/**
 * `human` writes marked lines to stderr so stdout stays free for the
 * summary; `jsonl` writes one JSON object per event to stdout.
 */
export function createLogger(
  format: OutputFormat,
  streams: { out: Writable; err: Writable } = { out: process.stdout, err: process.stderr },
): Logger {
  if (format === "jsonl") {
    const emit = (obj: Record<string, unknown>) => streams.out.write(JSON.stringify(obj) + "\n");
    return {
      stage: (stage, step, message) => emit({ level: "info", code: "STAGE", stage, step, message: clean(message) }),
      finding: (f) => emit({ ...f, message: clean(f.message) }),
      info: (message) => emit({ level: "info", code: "INFO", message: clean(message) }),
      warn: (message) => emit({ level: "warn", code: "WARN", message: clean(message) }),
    };
  }

  const line = (s: string) => streams.err.write(s + "\n");
  return {
    stage: (_stage, step, message) => line(`ℹ️  Step ${step}: ${clean(message)}`),
    finding: (f) => line(`${LEVEL_MARK[f.level]} ${clean(f.message)}`),
    info: (message) => line(`ℹ️  ${clean(message)}`),
    warn: (message) => line(`⚠️  ${clean(message)}`),
  };
}
