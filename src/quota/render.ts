import { QUOTA_NOT_SET, type QuotaRecord, type QuotaReport } from "../types/quota.js";

const ABSENT = "-";

function triple(used?: string, soft?: string, hard?: string): string {
  if (used === undefined || soft === undefined || hard === undefined) return ABSENT;
  return `${used}/${soft}/${hard}`;
}

function pair(used?: string, soft?: string): string {
  if (used === undefined || soft === undefined) return ABSENT;
  return `${used}/${soft}`;
}

/** `blocks: U/S/H; inodes: U/S/H` for xfs, `blocks: U/S; inodes: U/S` otherwise. */
export function renderQuota(record: QuotaRecord): string {
  if (record.format === "xfs") {
    const blocks = triple(record.blocksUsed, record.blocksSoft, record.blocksHard);
    const inodes = triple(record.inodesUsed, record.inodesSoft, record.inodesHard);
    return `blocks: ${blocks}; inodes: ${inodes}`;
  }
  return `blocks: ${pair(record.blocksUsed, record.blocksSoft)}; inodes: ${pair(record.inodesUsed, record.inodesSoft)}`;
}

export function renderQuotaStatus(report: QuotaReport, username: string): string {
  const record = report.get(username);
  return record ? renderQuota(record) : QUOTA_NOT_SET;
}
