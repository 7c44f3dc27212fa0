import type { ResourceBundle, ResourceKind } from "./domain/resources";
import type { EscalationMode, EscalationRule } from "./domain/task-policy";

export function scaleResource(base: number, mode: EscalationMode, attempt: number): number {
  switch (mode) {
    case "constant":
      return base;
    case "linear":
      return base * attempt;
    case "exponential":
      return base * 2 ** (attempt - 1);
  }
}

/**
 * Builds the attempt -> resources function for a task.
 * Every mode is non-decreasing in the attempt number, so retries never shrink a request.
 */
export function createEscalation(
  base: ResourceBundle,
  rule: EscalationRule,
): (attempt: number) => ResourceBundle {
  return (attempt: number): ResourceBundle => {
    if (!Number.isInteger(attempt) || attempt < 1) {
      throw new RangeError(`Attempt number must be a positive integer, got ${attempt}`);
    }
    const scale = (kind: ResourceKind): number =>
      Math.ceil(scaleResource(base[kind], rule[kind], attempt));
    return Object.freeze({
      cpus: scale("cpus"),
      memory: scale("memory"),
      time: scale("time"),
    });
  };
}
