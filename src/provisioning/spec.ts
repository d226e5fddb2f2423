import { z } from "zod";
import { STEP_ORDER, type ProvisioningSpec, type StepName, type StepReport } from "../types/account.js";
import { AdminError, AdminErrorCode } from "../shared/errors.js";

export const USERNAME_PATTERN = /^[a-z_][a-z0-9_.-]{0,31}$/i;
/** Group names become the `cn` of a DN, so they share the account-name charset. */
export const GROUP_PATTERN = USERNAME_PATTERN;
/** Largest uid below the reserved (uid_t)-1. */
export const MAX_UID = 4294967294;

/** Operator-facing step names mapped to the subsystem steps. */
export const STEP_ALIASES: Readonly<Record<string, StepName>> = {
  ldap: "directory",
  directory: "directory",
  kerberos: "credential",
  credential: "credential",
  home: "home",
  quota: "quota",
};

const stepNameSchema = z.enum(STEP_ORDER);

const provisioningSpecSchema = z.object({
  uidNumber: z.number().int().positive().max(MAX_UID),
  username: z.string().regex(USERNAME_PATTERN, "must start with a letter or underscore and use only [a-z0-9_.-]"),
  surname: z.string().trim().min(1),
  firstname: z.string().trim().min(1),
  password: z
    .string()
    .min(1)
    .refine((p) => !p.includes('"'), "must not contain double quotes"),
  groups: z
    .array(
      z
        .string()
        .trim()
        .refine(
          (g) => g.length === 0 || GROUP_PATTERN.test(g),
          "group names must start with a letter or underscore and use only [a-z0-9_.-]",
        ),
    )
    .default([]),
  steps: z.array(stepNameSchema).default([...STEP_ORDER]),
});

export type ProvisioningSpecInput = z.input<typeof provisioningSpecSchema>;

/** Validate and freeze a provisioning request. Throws VALIDATION_ERROR. */
export function createProvisioningSpec(input: ProvisioningSpecInput): ProvisioningSpec {
  const parsed = provisioningSpecSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new AdminError(AdminErrorCode.VALIDATION_ERROR, `Invalid account: ${issues.join("; ")}`, {
      username: input.username,
      issues,
    });
  }
  const { groups, steps, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    groups: Object.freeze(uniqueGroups(groups)),
    steps: Object.freeze(STEP_ORDER.filter((s) => steps.includes(s))),
  });
}

/** Split a comma-separated group list, trimming and dropping blanks and duplicates. */
export function parseGroupList(raw: string): string[] {
  return uniqueGroups(raw.split(","));
}

function uniqueGroups(groups: readonly string[]): string[] {
  return [...new Set(groups.map((g) => g.trim()).filter((g) => g.length > 0))];
}

/** Resolve canonical or alias step names; unknown names throw VALIDATION_ERROR. */
export function parseStepNames(names: readonly string[]): StepName[] {
  const selected = new Set<StepName>();
  for (const name of names) {
    const step = STEP_ALIASES[name.trim().toLowerCase()];
    if (!step) {
      throw new AdminError(AdminErrorCode.VALIDATION_ERROR, `Unknown step "${name}" (expected one of: ${Object.keys(STEP_ALIASES).join(", ")})`, {
        step: name,
      });
    }
    selected.add(step);
  }
  return STEP_ORDER.filter((s) => selected.has(s));
}

export function failedSteps<S extends string>(report: StepReport<S>): S[] {
  const failed: S[] = [];
  for (const [step, outcome] of Object.entries(report.outcomes)) {
    if (outcome === "failed" && isStepOf(report, step)) failed.push(step);
  }
  return failed;
}

function isStepOf<S extends string>(report: StepReport<S>, key: string): key is S {
  return Object.prototype.hasOwnProperty.call(report.outcomes, key);
}
