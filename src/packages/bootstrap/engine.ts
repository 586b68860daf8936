/*
Run reconciliation steps in order.

Each step is observed first.  In plan mode that is all that happens.  In
apply mode a step that is out of sync is applied and retried with backoff,
unless its error is marked not retryable.  A step that still fails stops the
run: later steps are reported as skipped and nothing already done is rolled
back.
*/

import getLogger from "@clusterboot/backend/logger";
import { retry } from "@clusterboot/util/async-utils";
import { prepareContext, type BootstrapContext, type BootstrapDeps } from "./context";
import type { DiscoveredAddress } from "./host-address";
import { isRetryable, StepError, type Observation, type Step, type StepResult } from "./step";
import { buildSteps, type BuildStepsOptions } from "./steps";
import type { DesiredState } from "./types";

const logger = getLogger("bootstrap:engine");

export type ReconcileMode = "apply" | "plan";

export type ReconcileReport = {
  mode: ReconcileMode;
  address: DiscoveredAddress;
  results: StepResult[];
  ok: boolean;
  error?: StepError;
};

export type ReconcileOptions = {
  mode?: ReconcileMode;
  onResult?: (result: StepResult) => void;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : `${err}`;
}

async function observe(step: Step, ctx: BootstrapContext): Promise<Observation> {
  try {
    return await step.observe(ctx);
  } catch (err) {
    // a host we cannot inspect is treated as out of sync
    logger.debug("observe failed", { step: step.id, err: errorMessage(err) });
    return { inSync: false, detail: `observe failed: ${errorMessage(err)}` };
  }
}

export async function reconcile(
  ctx: BootstrapContext,
  steps: Step[],
  { mode = "apply", onResult }: ReconcileOptions = {},
): Promise<ReconcileReport> {
  const results: StepResult[] = [];
  const record = (result: StepResult) => {
    results.push(result);
    onResult?.(result);
  };
  let error: StepError | undefined;

  for (const step of steps) {
    const base = { id: step.id, description: step.description };
    if (error) {
      record({ ...base, status: "skipped", detail: "", attempts: 0 });
      continue;
    }
    const observed = await observe(step, ctx);
    if (observed.inSync) {
      record({ ...base, status: "ok", detail: observed.detail, attempts: 0 });
      continue;
    }
    if (mode === "plan") {
      ctx.pending.add(step.id);
      record({ ...base, status: "pending", detail: observed.detail, attempts: 0 });
      continue;
    }

    logger.info("applying", { step: step.id, reason: observed.detail });
    const attempts = step.retry === false ? 1 : ctx.state.retry.attempts;
    let attempt = 0;
    try {
      const detail = await retry(
        async (n) => {
          attempt = n;
          return await step.apply(ctx);
        },
        {
          attempts,
          delay: ctx.state.retry.delayMs,
          shouldRetry: isRetryable,
          onError: (err, n) => {
            logger.warn("step attempt failed", { step: step.id, attempt: n, err: errorMessage(err) });
          },
        },
      );
      record({ ...base, status: "changed", detail: detail || observed.detail, attempts: attempt });
    } catch (err) {
      error = new StepError(step, attempt, err);
      logger.error("step failed", { step: step.id, err: errorMessage(err) });
      record({ ...base, status: "failed", detail: errorMessage(err), attempts: attempt });
    }
  }

  return {
    mode,
    address: ctx.address,
    results,
    ok: error === undefined,
    ...(error ? { error } : {}),
  };
}

export type RunOptions = ReconcileOptions & BuildStepsOptions;

// Discover the address, build the steps and reconcile.
export async function runBootstrap(
  state: DesiredState,
  deps: BootstrapDeps = {},
  { skipActivation, ...options }: RunOptions = {},
): Promise<ReconcileReport> {
  const ctx = await prepareContext(state, deps);
  return await reconcile(ctx, buildSteps(state, { skipActivation }), options);
}
