import { z } from "zod";
import { ResourceSpec } from "./resources";

// How a resource grows with the attempt number
export const EscalationMode = z.enum([
  "constant", // base
  "linear", // base * attempt
  "exponential", // base * 2^(attempt - 1)
]);
export type EscalationMode = z.infer<typeof EscalationMode>;

export const EscalationRule = z
  .object({
    cpus: EscalationMode.default("constant"),
    memory: EscalationMode.default("linear"),
    time: EscalationMode.default("linear"),
  })
  .strict();
export type EscalationRule = z.infer<typeof EscalationRule>;

export const ExitClassification = z.enum(["retry", "ignore", "fatal"]);
export type ExitClassification = z.infer<typeof ExitClassification>;

const ExitCode = z.number().int();

// Per task overrides, checked before the deployment-wide band
export const TaskExitCodes = z
  .object({
    fatal: z.array(ExitCode).default([]),
    retry: z.array(ExitCode).default([]),
    ignore: z.array(ExitCode).default([]),
  })
  .strict();
export type TaskExitCodes = z.infer<typeof TaskExitCodes>;

export const TaskPolicySpec = z
  .object({
    resources: ResourceSpec.default({}),
    escalation: EscalationRule.default({}),
    maxAttempts: z.number().int().positive().optional(),
    // resource group applied on top of the escalation result
    label: z.string().min(1).optional(),
    exitCodes: TaskExitCodes.default({}),
  })
  .strict();
export type TaskPolicySpec = z.infer<typeof TaskPolicySpec>;
export type TaskPolicySpecInput = z.input<typeof TaskPolicySpec>;

// Deployment-wide exit code handling
export const ExitCodePolicy = z
  .object({
    // codes conventionally produced by out-of-memory / out-of-time kills
    resourceExhaustion: z.array(ExitCode).default([137, 138, 139, 140]),
    unclassified: z.enum(["ignore", "fatal"]).default("ignore"),
  })
  .strict();
export type ExitCodePolicy = z.infer<typeof ExitCodePolicy>;
