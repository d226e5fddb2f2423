// Batch manifest: one account per line,
//   <uid> <group[,group...]> <username> <surname> <firstname> <password>
// Blank lines and lines starting with "#" are ignored.
import { open, type FileHandle } from "node:fs/promises";
import type { ProvisioningResult, ProvisioningSpec, StepName } from "../types/account.js";
import type { ProvisioningEngine } from "../provisioning/engine.js";
import { createProvisioningSpec, parseGroupList } from "../provisioning/spec.js";
import { AdminError, AdminErrorCode, errorMessage, isAdminError } from "../shared/errors.js";
import { logger } from "../logger.js";

export const MANIFEST_FIELD_COUNT = 6;

export interface ProcessFileOptions {
  /** Called with every full result, in file order. */
  readonly onResult?: (result: ProvisioningResult) => void;
  /** Called instead of throwing when the manifest cannot be opened or read. */
  readonly onUnreadable?: (error: AdminError) => void;
}

/**
 * Parse one manifest line. Returns undefined for blank and comment lines; throws
 * VALIDATION_ERROR for malformed ones.
 */
export function parseManifestLine(line: string, steps: readonly StepName[]): ProvisioningSpec | undefined {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#")) return undefined;

  const fields = trimmed.split(/\s+/);
  if (fields.length !== MANIFEST_FIELD_COUNT) {
    throw new AdminError(
      AdminErrorCode.VALIDATION_ERROR,
      `Expected ${MANIFEST_FIELD_COUNT} fields (uid groups username surname firstname password), got ${fields.length}`,
      { fields: fields.length },
    );
  }
  const [uid = "", groups = "", username = "", surname = "", firstname = "", password = ""] = fields;
  if (!/^\d+$/.test(uid)) {
    throw new AdminError(AdminErrorCode.VALIDATION_ERROR, `uid must be a positive integer, got "${uid}"`, { username });
  }
  return createProvisioningSpec({
    uidNumber: Number.parseInt(uid, 10),
    username,
    surname,
    firstname,
    password,
    groups: parseGroupList(groups),
    steps: [...steps],
  });
}

/**
 * Provision every account listed in the manifest, sequentially. Malformed lines are
 * logged with their line number and skipped. The map holds the overall result per
 * username; a username listed twice keeps its later result.
 */
export async function processFile(
  path: string,
  steps: readonly StepName[],
  engine: Pick<ProvisioningEngine, "provision">,
  options: ProcessFileOptions = {},
): Promise<Map<string, boolean>> {
  const results = new Map<string, boolean>();

  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    reportUnreadable(path, err, options);
    return results;
  }

  try {
    let lineNumber = 0;
    for await (const line of handle.readLines()) {
      lineNumber += 1;
      let spec: ProvisioningSpec | undefined;
      try {
        spec = parseManifestLine(line, steps);
      } catch (err) {
        if (!isAdminError(err, AdminErrorCode.VALIDATION_ERROR)) throw err;
        logger.warn({ path, line: lineNumber, error: err.message }, "Skipping malformed manifest line");
        continue;
      }
      if (!spec) continue;

      const result = await engine.provision(spec);
      results.set(spec.username, result.overall);
      options.onResult?.(result);
    }
  } catch (err) {
    if (isAdminError(err)) throw err;
    reportUnreadable(path, err, options);
  } finally {
    await handle.close();
  }
  return results;
}

function reportUnreadable(path: string, err: unknown, options: ProcessFileOptions): void {
  const error = new AdminError(AdminErrorCode.MANIFEST_UNREADABLE, `Cannot read manifest ${path}: ${errorMessage(err)}`, { path });
  logger.error({ path, error: errorMessage(err) }, "Manifest unreadable");
  options.onUnreadable?.(error);
}
