import type { LogLevel } from "@nestjs/common";

export interface ResolvedLogLevels {
  levels: LogLevel[];
  normalized: string;
  fallbackUsed: boolean;
}

/** Maps `logging.level` to the Nest levels at or above it; unknown values fall back to INFO. */
export function resolveLogLevels(level: unknown): ResolvedLogLevels {
  const normalizedInput = typeof level === "string" ? level.trim().toLowerCase() : "info";
  const aliasMap: Record<string, string> = {
    log: "info",
    info: "info",
    warning: "warn",
  };
  const canonical = aliasMap[normalizedInput] ?? normalizedInput;

  switch (canonical) {
    case "fatal":
      return {levels: ["fatal"], normalized: "fatal", fallbackUsed: false};
    case "error":
      return {levels: ["fatal", "error"], normalized: "error", fallbackUsed: false};
    case "warn":
      return {levels: ["fatal", "error", "warn"], normalized: "warn", fallbackUsed: false};
    case "info":
      return {levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: false};
    case "debug":
      return {levels: ["fatal", "error", "warn", "log", "debug"], normalized: "debug", fallbackUsed: false};
    case "verbose":
      return {levels: ["fatal", "error", "warn", "log", "debug", "verbose"], normalized: "verbose", fallbackUsed: false};
    default:
      return {levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: true};
  }
}
