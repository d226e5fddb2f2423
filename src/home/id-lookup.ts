import type { Executor } from "../execution/executor.js";
import { resolveTimeout } from "../types/duration.js";
import { logger } from "../logger.js";

export interface AccountIds {
  readonly uid: number;
  readonly gid: number;
}

/** Resolves an account's numeric ids through NSS; undefined when the account is unknown locally. */
export type AccountIdLookup = (username: string) => Promise<AccountIds | undefined>;

/**
 * Parse one `getent passwd` line.
 * Format: username:password:UID:GID:GECOS:directory:shell
 */
export function parsePasswdLine(line: string): AccountIds | undefined {
  const parts = line.trim().split(":");
  if (parts.length < 4) return undefined;
  const uid = Number.parseInt(parts[2] ?? "", 10);
  const gid = Number.parseInt(parts[3] ?? "", 10);
  if (Number.isNaN(uid) || Number.isNaN(gid)) return undefined;
  return { uid, gid };
}

/** `getent passwd <user>` sees LDAP accounts too once nslcd/sssd has picked them up. */
export function getentIdLookup(executor: Executor, timeoutCeiling = 0): AccountIdLookup {
  return async (username) => {
    const r = await executor.execute({ argv: ["getent", "passwd", username] }, resolveTimeout("instant", timeoutCeiling));
    if (r.exitCode !== 0) {
      logger.debug({ username, exitCode: r.exitCode }, "getent passwd found no account");
      return undefined;
    }
    const firstLine = r.stdout.split("\n").find((l) => l.startsWith(`${username}:`));
    return firstLine ? parsePasswdLine(firstLine) : undefined;
  };
}
