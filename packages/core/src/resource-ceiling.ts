import type { CeilingSpec } from "./domain/policy-config";
import {
  RESOURCE_KINDS,
  type ResourceBundle,
  type ResourceKind,
} from "./domain/resources";
import { MalformedCeilingValueError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { parseDuration, parseMemory } from "./units";

type CeilingEntry =
  | { status: "ok"; value: number }
  | { status: "malformed"; error: MalformedCeilingValueError };

function parseCpuCeiling(value: string | number): number | null {
  const parsed = typeof value === "number" ? value : Number(value.trim());
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

// a zero ceiling would block every submission, so it counts as malformed
function positive(parse: (raw: string | number) => number | null) {
  return (raw: string | number): number | null => {
    const value = parse(raw);
    return value !== null && value > 0 ? value : null;
  };
}

const CEILING_PARSERS: Record<ResourceKind, (raw: string | number) => number | null> = {
  cpus: parseCpuCeiling,
  memory: positive(parseMemory),
  time: positive(parseDuration),
};

function parseCeiling(kind: ResourceKind, raw: string | number): CeilingEntry {
  const value = CEILING_PARSERS[kind](raw);
  return value === null
    ? { status: "malformed", error: new MalformedCeilingValueError(kind, raw) }
    : { status: "ok", value };
}

/**
 * Process-wide upper bounds per resource kind. Built once at startup.
 *
 * A malformed ceiling does not fail resolution: clamping that kind is
 * skipped and a single warning is logged the first time it is hit.
 */
export class ResourceCeilingTable {
  private readonly entries: ReadonlyMap<ResourceKind, CeilingEntry>;
  private readonly reported = new Set<ResourceKind>();
  private readonly logger: Logger;

  constructor(spec: CeilingSpec = {}, logger: Logger = createLogger("Ceilings")) {
    const entries = new Map<ResourceKind, CeilingEntry>();
    for (const kind of RESOURCE_KINDS) {
      const raw = spec[kind];
      if (raw !== undefined) {
        entries.set(kind, parseCeiling(kind, raw));
      }
    }
    this.entries = entries;
    this.logger = logger;
  }

  // Ceiling for a kind, or null when unbounded (absent or malformed)
  ceiling(kind: ResourceKind): number | null {
    const entry = this.entries.get(kind);
    return entry?.status === "ok" ? entry.value : null;
  }

  malformedKinds(): ResourceKind[] {
    return [...this.entries]
      .filter(([, entry]) => entry.status === "malformed")
      .map(([kind]) => kind);
  }

  clamp(kind: ResourceKind, value: number): number {
    const entry = this.entries.get(kind);
    if (!entry) {
      return value;
    }
    if (entry.status === "malformed") {
      this.reportMalformed(kind, entry.error);
      return value;
    }
    return Math.min(value, entry.value);
  }

  clampBundle(bundle: ResourceBundle): ResourceBundle {
    return Object.freeze({
      cpus: this.clamp("cpus", bundle.cpus),
      memory: this.clamp("memory", bundle.memory),
      time: this.clamp("time", bundle.time),
    });
  }

  private reportMalformed(kind: ResourceKind, error: MalformedCeilingValueError): void {
    if (this.reported.has(kind)) {
      return;
    }
    this.reported.add(kind);
    this.logger.warn(`${error.message}; ${kind} requests are left unbounded`, {
      code: error.code,
      kind,
      rawValue: error.rawValue,
    });
  }
}
