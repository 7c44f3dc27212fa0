import type { PolicyConfig } from "./domain/policy-config";
import {
  DEFAULT_RESOURCES,
  mergeResources,
  type ResourceBundle,
} from "./domain/resources";
import type { ExitCodePolicy, TaskPolicySpec } from "./domain/task-policy";
import { UnknownTaskKindError } from "./errors";
import { createEscalation } from "./escalation";
import { createExitClassifier, type ExitClassifier } from "./exit-classifier";

export interface TaskPolicy {
  readonly taskKind: string;
  readonly baseResources: ResourceBundle;
  readonly escalation: (attempt: number) => ResourceBundle;
  readonly maxAttempts: number;
  readonly exitClassifier: ExitClassifier;
  readonly label: string | null;
}

export interface CompileTaskPolicyOptions {
  defaults?: ResourceBundle;
  maxAttempts?: number;
  exitCodes?: ExitCodePolicy;
}

export function compileTaskPolicy(
  taskKind: string,
  spec: TaskPolicySpec,
  options: CompileTaskPolicyOptions = {},
): TaskPolicy {
  const baseResources = mergeResources(options.defaults ?? DEFAULT_RESOURCES, spec.resources);
  return Object.freeze({
    taskKind,
    baseResources,
    escalation: createEscalation(baseResources, spec.escalation),
    maxAttempts: spec.maxAttempts ?? options.maxAttempts ?? 3,
    exitClassifier: createExitClassifier(spec.exitCodes, options.exitCodes),
    label: spec.label ?? null,
  });
}

// Read-only after construction; shared by every concurrent task instance
export class TaskPolicyRegistry {
  private readonly policies: ReadonlyMap<string, TaskPolicy>;

  constructor(policies: Iterable<TaskPolicy>) {
    const byKind = new Map<string, TaskPolicy>();
    for (const policy of policies) {
      byKind.set(policy.taskKind, policy);
    }
    this.policies = byKind;
  }

  static fromConfig(config: PolicyConfig): TaskPolicyRegistry {
    const defaults = mergeResources(DEFAULT_RESOURCES, config.defaults);
    return new TaskPolicyRegistry(
      Object.entries(config.tasks).map(([taskKind, spec]) =>
        compileTaskPolicy(taskKind, spec, {
          defaults,
          maxAttempts: config.maxAttempts,
          exitCodes: config.exitCodes,
        }),
      ),
    );
  }

  has(taskKind: string): boolean {
    return this.policies.has(taskKind);
  }

  taskKinds(): string[] {
    return [...this.policies.keys()];
  }

  lookup(taskKind: string): TaskPolicy {
    const policy = this.policies.get(taskKind);
    if (!policy) {
      throw new UnknownTaskKindError([taskKind]);
    }
    return policy;
  }

  // Run at startup against every task kind the pipeline can emit
  validate(taskKinds: Iterable<string>): void {
    const missing = [...new Set(taskKinds)].filter((taskKind) => !this.policies.has(taskKind));
    if (missing.length > 0) {
      throw new UnknownTaskKindError(missing);
    }
  }
}
