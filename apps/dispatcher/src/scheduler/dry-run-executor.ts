import {
  createLogger,
  formatDuration,
  formatMemory,
  type Logger,
  type SubmissionRequest,
} from "@pipeline-dispatch/core";
import type { TaskExecutor, TaskExitStatus } from "./task-executor";

export interface DryRunExecutorOptions {
  // attempts up to this number exit with resourceExitCode, later ones succeed
  resourceKills?: number;
  resourceExitCode?: number;
  logger?: Logger;
}

// "2 cpu, 8 GB, 8h [--cpus-per-task=2 ...]"
export function describeSubmission(request: SubmissionRequest): string {
  const { cpus, memory, time } = request.resources;
  const options = [...request.submissionOptions, request.extraSubmissionOptions]
    .filter((option) => option.length > 0)
    .join(" ");
  return `${cpus} cpu, ${formatMemory(memory)}, ${formatDuration(time)}${options ? ` [${options}]` : ""}`;
}

/**
 * Executor that submits nothing. Logs each request and answers with a
 * simulated resource kill for the first attempts, so a run walks the
 * escalation path of every task.
 */
export class DryRunExecutor implements TaskExecutor {
  private readonly resourceKills: number;
  private readonly resourceExitCode: number;
  private readonly logger: Logger;

  constructor(options: DryRunExecutorOptions = {}) {
    this.resourceKills = Math.max(0, options.resourceKills ?? 0);
    this.resourceExitCode = options.resourceExitCode ?? 137;
    this.logger = options.logger ?? createLogger("DryRun");
  }

  async submit(request: SubmissionRequest, signal: AbortSignal): Promise<TaskExitStatus> {
    signal.throwIfAborted();
    const exitCode = request.attempt <= this.resourceKills ? this.resourceExitCode : 0;
    this.logger
      .child({ taskKind: request.taskKind, instanceId: request.instanceId, attempt: request.attempt })
      .info(`Would submit to ${request.profileName}: ${describeSubmission(request)} (exit ${exitCode})`);
    return { exitCode };
  }
}
