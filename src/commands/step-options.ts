import { Option, type Command } from "commander";
import { STEP_ORDER, type StepName } from "../types/account.js";
import { parseStepNames } from "../provisioning/spec.js";

export type StepOptions = {
  all?: boolean;
  ldap?: boolean;
  kerberos?: boolean;
  home?: boolean;
  quota?: boolean;
  steps?: string[];
};

const SINGLE_STEP_FLAGS = [
  ["ldap", "directory", "only create the LDAP entries"],
  ["kerberos", "credential", "only create the Kerberos principal"],
  ["home", "home", "only create the home directory"],
  ["quota", "quota", "only set the disk quota"],
] as const satisfies ReadonlyArray<readonly [keyof StepOptions, StepName, string]>;

const ALL_FLAGS = ["all", "steps", ...SINGLE_STEP_FLAGS.map(([flag]) => flag)];

/** Attach the mutually exclusive step-selection flags to a provisioning command. */
export function addStepOptions(command: Command): Command {
  const others = (flag: string) => ALL_FLAGS.filter((f) => f !== flag);
  command.addOption(new Option("--all", "run every step (default)").conflicts(others("all")));
  for (const [flag, , description] of SINGLE_STEP_FLAGS) {
    command.addOption(new Option(`--${flag}`, description).conflicts(others(flag)));
  }
  command.addOption(
    new Option("--steps <names...>", "run only the named steps (ldap, kerberos, home, quota)").conflicts(others("steps")),
  );
  return command;
}

export function resolveSteps(options: StepOptions): StepName[] {
  if (options.steps && options.steps.length > 0) return parseStepNames(options.steps);
  for (const [flag, step] of SINGLE_STEP_FLAGS) {
    if (options[flag]) return [step];
  }
  return [...STEP_ORDER];
}
