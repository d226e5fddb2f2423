import type { QuotaRecord, QuotaReport } from "../../types/quota.js";
import type { QuotaReportFormat, ReportDimension } from "./types.js";

export { xfsReportFormat } from "./xfs.js";
export { genericReportFormat } from "./generic.js";
export type { ParsedRow, QuotaReportFormat, QuotaRowFields, ReportDimension } from "./types.js";

export interface ParseOptions {
  /** xfs_quota prints one dimension per report. Defaults to "blocks". */
  readonly dimension?: ReportDimension;
  /**
   * `quota -u <user>` rows start with the filesystem, not the account; every row is
   * then attributed to this user.
   */
  readonly owner?: string;
}

/** Split output into token rows, re-joining device paths that quota wrapped onto their own line. */
function tokenRows(output: string): string[][] {
  const rows: string[][] = [];
  let pending: string[] | undefined;
  for (const line of output.split("\n")) {
    const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
    if (tokens.length === 0) continue;
    if (pending) {
      rows.push([...pending, ...tokens]);
      pending = undefined;
      continue;
    }
    const [first] = tokens;
    if (tokens.length === 1 && first?.startsWith("/")) {
      pending = tokens;
      continue;
    }
    rows.push(tokens);
  }
  if (pending) rows.push(pending);
  return rows;
}

/**
 * Parse one quota tool report into `into` (a fresh map by default). Rows for a user
 * already present are merged field by field, so the xfs blocks and inodes reports
 * can be folded into the same report.
 */
export function parseReport(
  output: string,
  format: QuotaReportFormat,
  options: ParseOptions = {},
  into: QuotaReport = new Map(),
): QuotaReport {
  const dimension = options.dimension ?? "blocks";
  for (const tokens of tokenRows(output)) {
    if (tokens.length < format.minColumns) continue;
    const [first] = tokens;
    if (first === undefined || format.sentinels.has(first)) continue;

    const row = format.parseRow(tokens, dimension);
    if (!row) continue;
    const username = options.owner ?? row.username;
    if (options.owner && into.has(username)) continue; // first filesystem row wins
    const previous = into.get(username);
    const record: QuotaRecord = { ...previous, ...row.fields, username, format: format.format };
    into.set(username, record);
  }
  return into;
}
