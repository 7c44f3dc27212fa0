import { z } from "zod";
import { MemoryValue } from "./resources";

const ExtraOptions = z.string().default("");

export const LocalExecutorSpec = z
  .object({
    type: z.literal("local"),
    // host capacity; requests above it are clamped
    cpus: z.number().int().positive().optional(),
    memory: MemoryValue.optional(),
    extraOptions: ExtraOptions,
  })
  .strict();

export const SgeExecutorSpec = z
  .object({
    type: z.literal("sge"),
    queue: z.string().min(1).optional(),
    parallelEnvironment: z.string().min(1).default("smp"),
    memoryResource: z.string().min(1).default("h_vmem"),
    // h_vmem is enforced per slot on most SGE installs
    memoryPerSlot: z.boolean().default(true),
    extraOptions: ExtraOptions,
  })
  .strict();

export const SlurmExecutorSpec = z
  .object({
    type: z.literal("slurm"),
    partition: z.string().min(1).optional(),
    account: z.string().min(1).optional(),
    extraOptions: ExtraOptions,
  })
  .strict();

export const BatchExecutorSpec = z
  .object({
    type: z.literal("batch"),
    queue: z.string().min(1),
    extraOptions: ExtraOptions,
  })
  .strict();

export const ExecutorProfileSpec = z.discriminatedUnion("type", [
  LocalExecutorSpec,
  SgeExecutorSpec,
  SlurmExecutorSpec,
  BatchExecutorSpec,
]);
export type ExecutorProfileSpec = z.infer<typeof ExecutorProfileSpec>;
export type ExecutorType = ExecutorProfileSpec["type"];
