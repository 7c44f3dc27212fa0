import { AttemptTracker, type BeginAttemptOptions } from "./attempt-tracker";
import type { AttemptState } from "./domain/attempt";
import type { PolicyConfig } from "./domain/policy-config";
import { PolicyConfigError } from "./errors";
import { createExecutorProfile, type ExecutorProfile } from "./executor-profile";
import { createLogger, type Logger } from "./logger";
import { resolveAttempt } from "./policy-resolver";
import { ResourceCeilingTable } from "./resource-ceiling";
import type { ResolutionAction, ResolutionReason } from "./resolution-codes";
import { SubmissionComposer, type SubmissionRequest } from "./submission-composer";
import { TaskPolicyRegistry } from "./task-policy-registry";

type DispatchDecisionBase = {
  instanceId: string;
  taskKind: string;
  reason: ResolutionReason;
  attempt: number;
  exitCode: number | null;
};

export type DispatchDecision =
  | (DispatchDecisionBase & { action: "retry"; submission: SubmissionRequest })
  | (DispatchDecisionBase & { action: Exclude<ResolutionAction, "retry">; submission: null });

export interface PolicyEngineParts {
  registry: TaskPolicyRegistry;
  ceilings: ResourceCeilingTable;
  composer: SubmissionComposer;
  profile: ExecutorProfile;
  logger?: Logger;
}

export interface PolicyEngineOptions {
  // executor profile name; defaults to config.executor
  executor?: string;
  logger?: Logger;
}

/**
 * Entry points for the scheduler: begin, resolve and recordExit.
 * Holds only read-only tables, so one engine serves every concurrent task.
 */
export class PolicyEngine {
  readonly registry: TaskPolicyRegistry;
  readonly ceilings: ResourceCeilingTable;
  readonly profile: ExecutorProfile;
  private readonly composer: SubmissionComposer;
  private readonly tracker: AttemptTracker;
  private readonly logger: Logger;

  constructor(parts: PolicyEngineParts) {
    this.registry = parts.registry;
    this.ceilings = parts.ceilings;
    this.composer = parts.composer;
    this.profile = parts.profile;
    this.tracker = new AttemptTracker(parts.registry);
    this.logger = parts.logger ?? createLogger("PolicyEngine");
  }

  static fromConfig(config: PolicyConfig, options: PolicyEngineOptions = {}): PolicyEngine {
    const logger = options.logger ?? createLogger("PolicyEngine");
    const executorName = options.executor ?? config.executor;
    const profileSpec = Object.hasOwn(config.executors, executorName)
      ? config.executors[executorName]
      : undefined;
    if (!profileSpec) {
      throw new PolicyConfigError(`Executor profile "${executorName}" is not defined`, [
        `available: ${Object.keys(config.executors).join(", ")}`,
      ]);
    }
    const ceilings = new ResourceCeilingTable(config.ceilings, logger.child({ component: "Ceilings" }));
    return new PolicyEngine({
      registry: TaskPolicyRegistry.fromConfig(config),
      ceilings,
      composer: SubmissionComposer.fromConfig(config, ceilings, logger.child({ component: "Composer" })),
      profile: createExecutorProfile(executorName, profileSpec),
      logger,
    });
  }

  validateTaskKinds(taskKinds: Iterable<string>): void {
    this.registry.validate(taskKinds);
  }

  begin(taskKind: string, options?: BeginAttemptOptions): AttemptState {
    return this.tracker.begin(taskKind, options);
  }

  recordExit(state: AttemptState, exitCode: number): AttemptState {
    return this.tracker.recordExit(state, exitCode);
  }

  resolve(state: AttemptState): DispatchDecision {
    const policy = this.registry.lookup(state.taskKind);
    const resolution = resolveAttempt(state, policy, this.ceilings);
    const base: DispatchDecisionBase = {
      instanceId: state.instanceId,
      taskKind: state.taskKind,
      reason: resolution.reason,
      attempt: resolution.attempt,
      exitCode: resolution.exitCode,
    };

    const decision: DispatchDecision =
      resolution.action === "retry"
        ? {
            ...base,
            action: "retry",
            submission: this.composer.compose(
              resolution.resources,
              state.groupLabel,
              this.profile,
              {
                instanceId: state.instanceId,
                taskKind: state.taskKind,
                attempt: state.attemptNumber,
              },
            ),
          }
        : { ...base, action: resolution.action, submission: null };

    this.logger
      .child({ taskKind: state.taskKind, instanceId: state.instanceId, attempt: state.attemptNumber })
      .debug(`Resolved ${decision.action} (${decision.reason})`, {
        exitCode: decision.exitCode,
        resources: decision.submission?.resources,
      });
    return decision;
  }
}
