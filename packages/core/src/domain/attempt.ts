import { z } from "zod";

export const AttemptStatus = z.enum([
  "pending", // waiting for (re)submission or running
  "succeeded", // last attempt exited 0
]);
export type AttemptStatus = z.infer<typeof AttemptStatus>;

// One per task instance. Transitions return a new snapshot.
export interface AttemptState {
  readonly instanceId: string;
  readonly taskKind: string;
  readonly attemptNumber: number;
  readonly maxAttempts: number;
  readonly lastExitCode: number | null;
  readonly exitHistory: readonly number[];
  readonly groupLabel: string | null;
  readonly status: AttemptStatus;
}
