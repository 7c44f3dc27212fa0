import {
  createLogger,
  type AttemptState,
  type DispatchDecision,
  type Logger,
  type PolicyEngine,
  type ResolutionReason,
} from "@pipeline-dispatch/core";
import type { TaskExecutor } from "./task-executor";

export interface DispatchTask {
  taskKind: string;
  instanceId?: string;
  groupLabel?: string;
}

export type TaskOutcomeStatus = "succeeded" | "ignored" | "failed" | "cancelled";

export interface TaskOutcome {
  instanceId: string | null;
  taskKind: string;
  status: TaskOutcomeStatus;
  // attempts actually submitted
  attempts: number;
  exitCode: number | null;
  reason: ResolutionReason | "cancelled";
}

export interface RunSummary {
  outcomes: TaskOutcome[];
  // some task was ignored or cancelled; downstream aggregation is incomplete
  partial: boolean;
  // some task ended fatal
  failed: boolean;
  cancelled: boolean;
}

export interface TaskDispatcherOptions {
  engine: PolicyEngine;
  executor: TaskExecutor;
  maxConcurrentTasks?: number;
  // cancel tasks that have not started once one task ends fatal
  stopOnFatal?: boolean;
  onDecision?: (decision: DispatchDecision) => void;
  logger?: Logger;
}

function submittedAttempts(state: AttemptState): number {
  return state.exitHistory.length;
}

export function summarizeOutcomes(outcomes: TaskOutcome[]): RunSummary {
  return {
    outcomes,
    partial: outcomes.some((outcome) => outcome.status === "ignored" || outcome.status === "cancelled"),
    failed: outcomes.some((outcome) => outcome.status === "failed"),
    cancelled: outcomes.some((outcome) => outcome.status === "cancelled"),
  };
}

export class TaskDispatcher {
  private readonly engine: PolicyEngine;
  private readonly executor: TaskExecutor;
  private readonly maxConcurrentTasks: number;
  private readonly stopOnFatal: boolean;
  private readonly onDecision?: (decision: DispatchDecision) => void;
  private readonly logger: Logger;

  constructor(options: TaskDispatcherOptions) {
    this.engine = options.engine;
    this.executor = options.executor;
    this.maxConcurrentTasks = Math.max(1, options.maxConcurrentTasks ?? 4);
    this.stopOnFatal = options.stopOnFatal ?? true;
    this.onDecision = options.onDecision;
    this.logger = options.logger ?? createLogger("Dispatcher");
  }

  // Drives one task instance: resolve, submit, record the exit, repeat
  async runTask(task: DispatchTask, signal: AbortSignal): Promise<TaskOutcome> {
    if (signal.aborted) {
      return {
        instanceId: task.instanceId ?? null,
        taskKind: task.taskKind,
        status: "cancelled",
        attempts: 0,
        exitCode: null,
        reason: "cancelled",
      };
    }

    let state = this.engine.begin(task.taskKind, {
      instanceId: task.instanceId,
      groupLabel: task.groupLabel,
    });
    const log = this.logger.child({ taskKind: state.taskKind, instanceId: state.instanceId });
    const outcome = (status: TaskOutcomeStatus, reason: TaskOutcome["reason"]): TaskOutcome => ({
      instanceId: state.instanceId,
      taskKind: state.taskKind,
      status,
      attempts: submittedAttempts(state),
      exitCode: state.lastExitCode,
      reason,
    });

    for (;;) {
      const decision = this.engine.resolve(state);
      this.onDecision?.(decision);

      switch (decision.action) {
        case "done":
          log.info(`Succeeded after ${submittedAttempts(state)} attempt(s)`);
          return outcome("succeeded", decision.reason);
        case "ignore":
          log.warn(`Exit ${decision.exitCode} ignored (${decision.reason}); continuing without it`);
          return outcome("ignored", decision.reason);
        case "fatal":
          log.error(`Exit ${decision.exitCode} is fatal (${decision.reason})`, {
            exitHistory: state.exitHistory,
          });
          return outcome("failed", decision.reason);
        case "retry":
          break;
      }

      if (signal.aborted) {
        return outcome("cancelled", "cancelled");
      }

      log.child({ attempt: decision.attempt }).info(`Submitting (${decision.reason})`, {
        resources: decision.submission.resources,
        submissionOptions: decision.submission.submissionOptions,
      });

      let exitCode: number;
      try {
        ({ exitCode } = await this.executor.submit(decision.submission, signal));
      } catch (error) {
        if (signal.aborted) {
          return outcome("cancelled", "cancelled");
        }
        throw error;
      }

      state = this.engine.recordExit(state, exitCode);
      if (signal.aborted && state.status !== "succeeded") {
        return outcome("cancelled", "cancelled");
      }
    }
  }

  // Runs independent task instances with at most maxConcurrentTasks in flight
  async run(tasks: readonly DispatchTask[], signal?: AbortSignal): Promise<RunSummary> {
    const controller = new AbortController();
    const abort = () => controller.abort();
    if (signal?.aborted) {
      abort();
    }
    signal?.addEventListener("abort", abort, { once: true });

    const outcomes: TaskOutcome[] = [];
    let nextIndex = 0;
    const worker = async (): Promise<void> => {
      while (nextIndex < tasks.length) {
        const index = nextIndex;
        nextIndex += 1;
        const task = tasks[index];
        if (!task) {
          return;
        }
        let result: TaskOutcome;
        try {
          result = await this.runTask(task, controller.signal);
        } catch (error) {
          // stop the other workers before rejecting
          abort();
          throw error;
        }
        outcomes[index] = result;
        if (result.status === "failed" && this.stopOnFatal && !controller.signal.aborted) {
          this.logger.error(`Stopping run after fatal ${result.taskKind}`);
          abort();
        }
      }
    };

    const workerCount = Math.min(this.maxConcurrentTasks, tasks.length);
    const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    signal?.removeEventListener("abort", abort);
    const rejected = settled.find(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    if (rejected) {
      throw rejected.reason;
    }

    const summary = summarizeOutcomes(outcomes);
    this.logger.info("Run finished", {
      tasks: outcomes.length,
      partial: summary.partial,
      failed: summary.failed,
      cancelled: summary.cancelled,
    });
    return summary;
  }
}
