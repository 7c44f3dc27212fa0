import {
  Logger,
  PolicyEngine,
  parsePolicyConfig,
  type SubmissionRequest,
} from "@pipeline-dispatch/core";
import type { TaskExecutor, TaskExitStatus } from "../src/scheduler/task-executor";

export const quietLogger = () => new Logger({ component: "test", minLevel: "error", jsonOutput: false });

export const testPolicyConfig = parsePolicyConfig({
  ceilings: { cpus: 8, memory: "36.GB", time: "48.h" },
  maxAttempts: 3,
  resourceGroups: {
    high_sensitivity: { cpus: 1, memory: "40 GB" },
  },
  tasks: {
    consensus_build: { resources: { memory: "4 GB" } },
    draft_selection: { exitCodes: { fatal: [73] } },
    output_documentation: { maxAttempts: 1 },
  },
});

export function createTestEngine(): PolicyEngine {
  return PolicyEngine.fromConfig(testPolicyConfig, { logger: quietLogger() });
}

// Replays scripted exit codes per instance id; unscripted attempts succeed
export class ScriptedExecutor implements TaskExecutor {
  readonly submissions: SubmissionRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly script: Record<string, number[]> = {},
    private readonly onSubmit?: (request: SubmissionRequest) => void,
  ) {}

  async submit(request: SubmissionRequest): Promise<TaskExitStatus> {
    this.submissions.push(request);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      this.onSubmit?.(request);
      await new Promise<void>((resolve) => setImmediate(resolve));
      const codes = this.script[request.instanceId] ?? [];
      return { exitCode: codes[request.attempt - 1] ?? 0 };
    } finally {
      this.inFlight -= 1;
    }
  }
}
