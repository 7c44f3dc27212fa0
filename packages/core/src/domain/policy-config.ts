import { z } from "zod";
import { ExecutorProfileSpec } from "./executor-profile";
import { ResourceSpec } from "./resources";
import { ExitCodePolicy, TaskPolicySpec } from "./task-policy";

// Ceilings stay raw: a malformed value is reported at clamp time, not at load time
const RawCeilingValue = z.union([z.number(), z.string()]);

export const CeilingSpec = z
  .object({
    cpus: RawCeilingValue.optional(),
    memory: RawCeilingValue.optional(),
    time: RawCeilingValue.optional(),
  })
  .strict();
export type CeilingSpec = z.infer<typeof CeilingSpec>;

export const PolicyConfigSchema = z
  .object({
    ceilings: CeilingSpec.default({}),
    defaults: ResourceSpec.default({}),
    maxAttempts: z.number().int().positive().default(3),
    exitCodes: ExitCodePolicy.default({}),
    resourceGroups: z.record(z.string().min(1), ResourceSpec).default({}),
    tasks: z.record(z.string().min(1), TaskPolicySpec),
    executors: z
      .record(z.string().min(1), ExecutorProfileSpec)
      .default({ local: { type: "local" } }),
    executor: z.string().min(1).default("local"),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (!Object.hasOwn(config.executors, config.executor)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["executor"],
        message: `Executor profile "${config.executor}" is not defined`,
      });
    }
    for (const [taskKind, task] of Object.entries(config.tasks)) {
      if (task.label && !Object.hasOwn(config.resourceGroups, task.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tasks", taskKind, "label"],
          message: `Resource group "${task.label}" is not defined`,
        });
      }
    }
  });
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;
export type PolicyConfigInput = z.input<typeof PolicyConfigSchema>;
