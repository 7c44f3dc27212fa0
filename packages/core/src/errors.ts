import type { ResourceKind } from "./domain/resources";

export const POLICY_ERROR_CODE = {
  UNKNOWN_TASK_KIND: "unknown_task_kind",
  MALFORMED_CEILING_VALUE: "malformed_ceiling_value",
  INVALID_POLICY_CONFIG: "invalid_policy_config",
  INVALID_ATTEMPT_TRANSITION: "invalid_attempt_transition",
} as const;

export type PolicyErrorCode = (typeof POLICY_ERROR_CODE)[keyof typeof POLICY_ERROR_CODE];

export class PolicyError extends Error {
  readonly code: PolicyErrorCode;

  constructor(code: PolicyErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// A task kind was introduced without a policy. Raised by startup validation.
export class UnknownTaskKindError extends PolicyError {
  readonly taskKinds: readonly string[];

  constructor(taskKinds: readonly string[]) {
    super(
      POLICY_ERROR_CODE.UNKNOWN_TASK_KIND,
      `No task policy registered for: ${taskKinds.join(", ")}`,
    );
    this.taskKinds = taskKinds;
  }
}

// Recovered inside the ceiling table; never escapes a resolution
export class MalformedCeilingValueError extends PolicyError {
  readonly kind: ResourceKind;
  readonly rawValue: string | number;

  constructor(kind: ResourceKind, rawValue: string | number) {
    super(
      POLICY_ERROR_CODE.MALFORMED_CEILING_VALUE,
      `Invalid ${kind} ceiling: ${JSON.stringify(rawValue)}`,
    );
    this.kind = kind;
    this.rawValue = rawValue;
  }
}

export class PolicyConfigError extends PolicyError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(
      POLICY_ERROR_CODE.INVALID_POLICY_CONFIG,
      issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message,
    );
    this.issues = issues;
  }
}

export class InvalidAttemptTransitionError extends PolicyError {
  constructor(message: string) {
    super(POLICY_ERROR_CODE.INVALID_ATTEMPT_TRANSITION, message);
  }
}
