import type { StepOutcome, StepReport } from "../types/account.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

/** One subsystem operation. Resolving true means success; false or a throw means failure. */
export type StepOperation = () => Promise<boolean>;

export type StepPlan<S extends string> = ReadonlyArray<readonly [S, StepOperation]>;

/**
 * Run the requested steps of a plan in plan order, starting from `initial` (every step
 * "skipped"). A failing step is recorded and never stops the steps after it.
 */
export async function runSteps<S extends string>(
  username: string,
  plan: StepPlan<S>,
  requested: readonly S[],
  initial: Readonly<Record<S, StepOutcome>>,
): Promise<StepReport<S>> {
  const outcomes: Record<S, StepOutcome> = { ...initial };
  let overall = true;

  for (const [step, operation] of plan) {
    if (!requested.includes(step)) continue;
    try {
      outcomes[step] = (await operation()) ? "succeeded" : "failed";
    } catch (err) {
      logger.error({ username, step, error: errorMessage(err) }, "Step failed");
      outcomes[step] = "failed";
    }
    if (outcomes[step] === "failed") overall = false;
  }

  return { username, outcomes, overall };
}
