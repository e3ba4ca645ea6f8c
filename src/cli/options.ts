import { InvalidArgumentError } from "commander";

const DURATION_RE = /^(\d+)([dhm])$/;
const UNIT_MS: Record<string, number> = {
  d: 24 * 60 * 60 * 1000,
  h: 60 * 60 * 1000,
  m: 60 * 1000,
};

/** `7d`, `24h`, `30m` → milliseconds. */
export function parseDuration(value: string): number {
  const match = DURATION_RE.exec(value.trim().toLowerCase());
  const unit = match?.[2] ? UNIT_MS[match[2]] : undefined;
  if (!match || unit === undefined) {
    throw new InvalidArgumentError(`Invalid duration "${value}". Use a format like 7d, 24h or 30m.`);
  }
  return Number(match[1]) * unit;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}
