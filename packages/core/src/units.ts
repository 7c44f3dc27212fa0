// Memory and duration quantities as they appear in policy files ("36.GB", "48.h", "1d 12h")

const MEMORY_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"] as const;
type MemoryUnit = (typeof MEMORY_UNITS)[number];

const MEMORY_UNIT_BYTES: Record<MemoryUnit, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
  PB: 1024 ** 5,
};

export const KIB = MEMORY_UNIT_BYTES.KB;
export const MIB = MEMORY_UNIT_BYTES.MB;
export const GIB = MEMORY_UNIT_BYTES.GB;

const DURATION_UNITS = ["ms", "s", "m", "h", "d"] as const;
type DurationUnit = (typeof DURATION_UNITS)[number];

const DURATION_UNIT_MS: Record<DurationUnit, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

export const SECOND_MS = DURATION_UNIT_MS.s;
export const MINUTE_MS = DURATION_UNIT_MS.m;
export const HOUR_MS = DURATION_UNIT_MS.h;
export const DAY_MS = DURATION_UNIT_MS.d;

function isMemoryUnit(value: string): value is MemoryUnit {
  return (MEMORY_UNITS as readonly string[]).includes(value);
}

function isDurationUnit(value: string): value is DurationUnit {
  return (DURATION_UNITS as readonly string[]).includes(value);
}

function toNonNegativeNumber(value: number): number | null {
  return Number.isFinite(value) && value >= 0 ? value : null;
}

/**
 * Parses a memory quantity into bytes. Numbers are taken as bytes.
 * Returns null for anything that is not a non-negative quantity with a known unit.
 */
export function parseMemory(value: string | number): number | null {
  if (typeof value === "number") {
    return toNonNegativeNumber(value);
  }
  const match = value.trim().match(/^(\d+(?:\.\d+)?)(?:\s*\.?\s*([a-z]+))?$/i);
  const rawAmount = match?.[1];
  if (!rawAmount) {
    return null;
  }
  const unit = (match[2] ?? "B").toUpperCase();
  if (!isMemoryUnit(unit)) {
    return null;
  }
  const amount = Number.parseFloat(rawAmount);
  const bytes = toNonNegativeNumber(amount * MEMORY_UNIT_BYTES[unit]);
  return bytes === null ? null : Math.ceil(bytes);
}

/**
 * Parses a duration into milliseconds. Numbers are taken as milliseconds.
 * Several tokens may be combined: "1d 12h", "2h30m".
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === "number") {
    return toNonNegativeNumber(value);
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const tokenPattern = /(\d+(?:\.\d+)?)\s*\.?\s*(ms|s|m|h|d)(?![a-z])/giy;
  let total = 0;
  let consumed = 0;
  for (;;) {
    while (trimmed[consumed] === " ") {
      consumed += 1;
    }
    if (consumed >= trimmed.length) {
      break;
    }
    tokenPattern.lastIndex = consumed;
    const match = tokenPattern.exec(trimmed);
    const rawAmount = match?.[1];
    const rawUnit = match?.[2]?.toLowerCase();
    if (!match || !rawAmount || !rawUnit || !isDurationUnit(rawUnit)) {
      return null;
    }
    total += Number.parseFloat(rawAmount) * DURATION_UNIT_MS[rawUnit];
    consumed = tokenPattern.lastIndex;
  }
  const ms = toNonNegativeNumber(total);
  return ms === null ? null : Math.ceil(ms);
}

function formatAmount(value: number): string {
  return String(Math.round(value * 100) / 100);
}

export function formatMemory(bytes: number): string {
  let unit: MemoryUnit = "B";
  for (const candidate of MEMORY_UNITS) {
    if (bytes >= MEMORY_UNIT_BYTES[candidate]) {
      unit = candidate;
    }
  }
  return `${formatAmount(bytes / MEMORY_UNIT_BYTES[unit])} ${unit}`;
}

export function formatDuration(ms: number): string {
  if (ms < SECOND_MS) {
    return `${Math.round(ms)}ms`;
  }
  const parts: string[] = [];
  let remaining = Math.round(ms / SECOND_MS) * SECOND_MS;
  for (const unit of ["d", "h", "m", "s"] as const) {
    const size = DURATION_UNIT_MS[unit];
    const amount = Math.floor(remaining / size);
    if (amount > 0) {
      parts.push(`${amount}${unit}`);
      remaining -= amount * size;
    }
  }
  return parts.join(" ");
}

// HH:MM:SS with hours allowed past 24 (SGE h_rt)
export function formatClockDuration(ms: number): string {
  const totalSeconds = Math.ceil(ms / SECOND_MS);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}
