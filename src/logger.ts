import pino from "pino";

export function createLogger(level: string = "info") {
  return pino({ level, name: "fixed-rate-amm" });
}

export type Logger = ReturnType<typeof createLogger>;

export const silentLogger: Logger = createLogger("silent");

/** JSON has no bigint; log amounts as decimal strings */
export function toLogFields(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}
