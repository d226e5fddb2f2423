import type { Executor } from "../execution/executor.js";
import { resolveTimeout } from "../types/duration.js";
import { DEFAULT_FILESYSTEM, SUPPORTED_FILESYSTEMS, type FilesystemType } from "../types/quota.js";
import { logger } from "../logger.js";

export function isSupportedFilesystem(value: string): value is FilesystemType {
  return SUPPORTED_FILESYSTEMS.some((fs) => fs === value);
}

/**
 * Filesystem type of the mount holding `path`, via findmnt. Falls back to ext4 when
 * the type is unknown or unsupported; never throws.
 */
export async function detectFilesystemType(executor: Executor, path: string, timeoutCeiling = 0): Promise<FilesystemType> {
  const r = await executor.execute(
    { argv: ["findmnt", "--noheadings", "--output", "FSTYPE", "--target", path] },
    resolveTimeout("instant", timeoutCeiling),
  );
  if (r.exitCode !== 0) {
    logger.warn({ path, exitCode: r.exitCode, stderr: r.stderr.trim() }, `findmnt failed; assuming ${DEFAULT_FILESYSTEM}`);
    return DEFAULT_FILESYSTEM;
  }
  const detected = (r.stdout.trim().split(/\s+/)[0] ?? "").toLowerCase();
  if (isSupportedFilesystem(detected)) {
    logger.debug({ path, filesystem: detected }, "Detected filesystem type");
    return detected;
  }
  logger.warn({ path, detected }, `Unsupported or unknown filesystem; assuming ${DEFAULT_FILESYSTEM}`);
  return DEFAULT_FILESYSTEM;
}

/**
 * Memoized filesystem type for the home base: the configured override when set,
 * otherwise detected once per run.
 */
export function filesystemResolver(
  executor: Executor,
  path: string,
  override: FilesystemType | null,
  timeoutCeiling = 0,
): () => Promise<FilesystemType> {
  let resolved: Promise<FilesystemType> | undefined;
  return () => {
    if (override) return Promise.resolve(override);
    resolved ??= detectFilesystemType(executor, path, timeoutCeiling);
    return resolved;
  };
}
