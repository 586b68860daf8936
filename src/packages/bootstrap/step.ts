import type { BootstrapContext } from "./context";

export type Observation = {
  inSync: boolean;
  detail: string;
};

export interface Step {
  id: string;
  description: string;
  observe: (ctx: BootstrapContext) => Promise<Observation>;
  // returns a short description of what was done
  apply: (ctx: BootstrapContext) => Promise<string>;
  // false for steps that must not be repeated on failure (checks, polling)
  retry?: boolean;
}

export type StepStatus = "ok" | "changed" | "pending" | "failed" | "skipped";

export type StepResult = {
  id: string;
  description: string;
  status: StepStatus;
  detail: string;
  attempts: number;
};

// Errors carrying `retryable: false` describe a host that retrying cannot fix.
export function isRetryable(err: unknown): boolean {
  return !(typeof err === "object" && err !== null && "retryable" in err && err.retryable === false);
}

export class StepError extends Error {
  stepId: string;
  attempts: number;

  constructor(step: Pick<Step, "id">, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : `${cause}`;
    super(`step ${step.id} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${reason}`, {
      cause,
    });
    this.name = "StepError";
    this.stepId = step.id;
    this.attempts = attempts;
  }
}
