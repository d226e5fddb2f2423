/** Subsystems a provisioning run can touch, in execution order. */
export const STEP_ORDER = ["directory", "credential", "home", "quota"] as const;

export type StepName = (typeof STEP_ORDER)[number];

/** Steps that deprovisioning undoes; quota entries disappear with the account. */
export const DEPROVISION_STEP_ORDER = ["directory", "credential", "home"] as const;

export type DeprovisionStepName = (typeof DEPROVISION_STEP_ORDER)[number];

export type StepOutcome = "succeeded" | "failed" | "skipped";

/** One provisioning attempt for one account. Frozen once built. */
export interface ProvisioningSpec {
  readonly uidNumber: number;
  readonly username: string;
  readonly surname: string;
  readonly firstname: string;
  readonly password: string;
  readonly groups: readonly string[];
  readonly steps: readonly StepName[];
}

export interface StepReport<S extends string> {
  readonly username: string;
  readonly outcomes: Readonly<Record<S, StepOutcome>>;
  /** True iff every requested step succeeded. */
  readonly overall: boolean;
}

export type ProvisioningResult = StepReport<StepName>;

export type DeprovisionResult = StepReport<DeprovisionStepName>;
