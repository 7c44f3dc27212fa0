import { z } from "zod";
import { GIB, HOUR_MS, parseDuration, parseMemory } from "../units";

// Resource kinds a task may request
export const ResourceKind = z.enum(["cpus", "memory", "time"]);
export type ResourceKind = z.infer<typeof ResourceKind>;

export const RESOURCE_KINDS: readonly ResourceKind[] = ResourceKind.options;

// cpus: cores, memory: bytes, time: milliseconds
export type ResourceBundle = Readonly<Record<ResourceKind, number>>;
export type PartialResourceBundle = Partial<ResourceBundle>;

export const MemoryValue = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const bytes = parseMemory(value);
  if (bytes === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid memory value: ${value}` });
    return z.NEVER;
  }
  return bytes;
});

export const DurationValue = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const ms = parseDuration(value);
  if (ms === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration value: ${value}` });
    return z.NEVER;
  }
  return ms;
});

// Partially specified request, merged over defaults before use
export const ResourceSpec = z
  .object({
    cpus: z.number().int().positive().optional(),
    memory: MemoryValue.optional(),
    time: DurationValue.optional(),
  })
  .strict();
export type ResourceSpec = z.input<typeof ResourceSpec>;

export const DEFAULT_RESOURCES: ResourceBundle = Object.freeze({
  cpus: 1,
  memory: 7 * GIB,
  time: 4 * HOUR_MS,
});

export function mergeResources(
  base: ResourceBundle,
  ...overrides: PartialResourceBundle[]
): ResourceBundle {
  const merged: Record<ResourceKind, number> = { ...base };
  for (const override of overrides) {
    for (const kind of RESOURCE_KINDS) {
      const value = override[kind];
      if (value !== undefined) {
        merged[kind] = value;
      }
    }
  }
  return Object.freeze(merged);
}
