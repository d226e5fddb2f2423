import type { StepReport } from "../types/account.js";
import { failedSteps } from "../provisioning/spec.js";
import { theme } from "./theme.js";

/** One line per account: ok, or the steps that failed. */
export function formatStepReport<S extends string>(report: StepReport<S>): string {
  if (report.overall) return `${theme.success("✓")} ${report.username}`;
  return `${theme.error("✗")} ${report.username} ${theme.muted(`(failed: ${failedSteps(report).join(", ")})`)}`;
}

export function formatSummary(results: ReadonlyMap<string, boolean>): string {
  const failed = [...results.values()].filter((ok) => !ok).length;
  const line = `${results.size - failed} succeeded, ${failed} failed`;
  return failed === 0 ? theme.success(line) : theme.warning(line);
}
