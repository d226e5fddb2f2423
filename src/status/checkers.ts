// Status checks answer yes/no and never throw: a subsystem that cannot be asked
// counts as "not present".
import { stat } from "node:fs/promises";
import type { DirectoryService } from "../types/directory.js";
import type { CredentialRealm } from "../types/realm.js";
import { homePathFor } from "../home/paths.js";
import { errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

export async function checkCredential(realm: CredentialRealm, username: string): Promise<boolean> {
  try {
    return await realm.hasPrincipal(username);
  } catch (err) {
    logger.warn({ username, error: errorMessage(err) }, "Credential check failed");
    return false;
  }
}

export async function checkHomeDirectory(base: string, username: string): Promise<boolean> {
  try {
    return (await stat(homePathFor(base, username))).isDirectory();
  } catch (err) {
    logger.debug({ username, error: errorMessage(err) }, "Home directory not found");
    return false;
  }
}

export async function checkDirectoryEntry(directory: DirectoryService, dn: string): Promise<boolean> {
  try {
    return await directory.exists(dn);
  } catch (err) {
    logger.warn({ dn, error: errorMessage(err) }, "Directory lookup failed");
    return false;
  }
}
