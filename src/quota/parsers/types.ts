import type { QuotaFormat, QuotaRecord } from "../../types/quota.js";

/** Which dimension an xfs_quota report describes; generic rows carry both. */
export type ReportDimension = "blocks" | "inodes";

/** Fields a single report row contributes to a QuotaRecord. */
export type QuotaRowFields = Omit<QuotaRecord, "username" | "format">;

export interface ParsedRow {
  readonly username: string;
  readonly fields: QuotaRowFields;
}

export interface QuotaReportFormat {
  readonly format: QuotaFormat;
  /** Rows with fewer whitespace-separated tokens than this are ignored. */
  readonly minColumns: number;
  /** A row whose first token is one of these is a header, separator or the root row. */
  readonly sentinels: ReadonlySet<string>;
  /** Turn a row's tokens (already length- and sentinel-checked) into fields. */
  parseRow(tokens: readonly string[], dimension: ReportDimension): ParsedRow | undefined;
}
