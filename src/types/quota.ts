/** Filesystems the quota subsystem knows how to drive. */
export const SUPPORTED_FILESYSTEMS = ["xfs", "ext4", "ext3", "ext2"] as const;

export type FilesystemType = (typeof SUPPORTED_FILESYSTEMS)[number];

export const DEFAULT_FILESYSTEM: FilesystemType = "ext4";

/** Report family: xfs_quota output or the generic quota tools (repquota, quota). */
export type QuotaFormat = "xfs" | "generic";

/**
 * Canonical per-user quota view. Values are kept as the tool printed them
 * ("50M", "1000"); a dimension with no row stays undefined.
 */
export interface QuotaRecord {
  readonly username: string;
  readonly format: QuotaFormat;
  readonly blocksUsed?: string;
  readonly blocksSoft?: string;
  readonly blocksHard?: string;
  readonly inodesUsed?: string;
  readonly inodesSoft?: string;
  readonly inodesHard?: string;
}

export type QuotaReport = Map<string, QuotaRecord>;

export interface QuotaLimits {
  readonly blockSoft: string;
  readonly blockHard: string;
  readonly inodeSoft: string;
  readonly inodeHard: string;
}

export const QUOTA_NOT_SET = "not set";
