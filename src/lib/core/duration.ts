import { ParseError } from "./errors.js";

/** Milliseconds per unit suffix accepted in duration literals. */
const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /^(\d*)(?:\.(\d*))?([a-zµμ]+)/;

/** Largest duration expressible in int64 nanoseconds, about 2562047h. */
export const MAX_DURATION_MS = 9_223_372_036_854;

/**
 * Parse a duration literal such as "300ms", "1.5h" or "1h30m" into milliseconds.
 * A bare "0" is accepted; every other number needs a unit. Anything longer
 * than MAX_DURATION_MS is rejected.
 */
export function parseDuration(literal: string): number {
  const input = literal.trim();
  let rest = input;
  let sign = 1;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    if (rest[0] === "-") sign = -1;
    rest = rest.slice(1);
  }
  if (rest === "0") return 0;
  if (rest === "") throw new ParseError(literal, "invalid duration");

  let total = 0;
  while (rest !== "") {
    const m = SEGMENT.exec(rest);
    if (!m) throw new ParseError(literal, "invalid duration");
    const [segment, whole = "", frac = "", unit = ""] = m;
    if (whole === "" && frac === "") {
      throw new ParseError(literal, "invalid duration");
    }
    const perUnit = UNIT_MS[unit];
    if (perUnit === undefined) {
      throw new ParseError(literal, `unknown unit "${unit}" in duration`);
    }
    total += Number(`${whole || "0"}.${frac || "0"}`) * perUnit;
    rest = rest.slice(segment.length);
  }
  if (!Number.isFinite(total) || total > MAX_DURATION_MS) {
    throw new ParseError(literal, "invalid duration");
  }
  return sign * total;
}

/** Render milliseconds back into a compact literal, e.g. 5400000 -> "1h30m". */
export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";
  const sign = ms < 0 ? "-" : "";
  let rest = Math.abs(ms);
  let out = "";
  for (const [unit, size] of [
    ["h", 3_600_000],
    ["m", 60_000],
    ["s", 1000],
  ] as const) {
    const n = Math.floor(rest / size);
    if (n > 0) {
      out += `${n}${unit}`;
      rest -= n * size;
    }
  }
  if (rest > 0) out += `${rest}ms`;
  return sign + out;
}
