import type { AdminConfig } from "../types/config.js";
import type { DirectoryEntry, DirectorySearchHit, DirectoryService } from "../types/directory.js";
import type { CredentialRealm } from "../types/realm.js";
import type { FilesystemType, QuotaRecord, QuotaReport } from "../types/quota.js";
import type { QuotaBackend } from "../quota/backend.js";
import { peopleBase } from "../directory/entries.js";
import { checkCredential, checkHomeDirectory } from "./checkers.js";
import { logger } from "../logger.js";

export const POSIX_ACCOUNT_FILTER = "(objectClass=posixAccount)";
const LISTED_ATTRIBUTES = ["uid", "uidNumber", "cn", "homeDirectory"] as const;

export interface UserStatus {
  readonly entry: DirectoryEntry;
  readonly credentialPresent: boolean;
  readonly homeDirPresent: boolean;
  readonly quota: QuotaRecord | undefined;
}

export interface ListingContext {
  readonly config: AdminConfig;
  readonly directory: DirectoryService;
  readonly realm: CredentialRealm;
  readonly quota: QuotaBackend;
  readonly resolveFilesystem: () => Promise<FilesystemType>;
}

export type UserListing = { readonly detailed: false; readonly users: DirectoryEntry[] } | { readonly detailed: true; readonly users: UserStatus[] };

function toEntry(hit: DirectorySearchHit): DirectoryEntry | undefined {
  const first = (name: string): string => hit.attributes[name]?.[0] ?? "";
  const uid = first("uid");
  if (!uid) {
    logger.debug({ dn: hit.dn }, "Search hit without uid ignored");
    return undefined;
  }
  return { uid, uidNumber: first("uidNumber"), cn: first("cn"), homeDirectory: first("homeDirectory") };
}

/**
 * Every posix account under the people OU. Detailed listings add credential, home and
 * quota status, reading the quota report once for the whole listing.
 */
export async function listUsers(ctx: ListingContext, options: { detailed: boolean }): Promise<UserListing> {
  const hits = await ctx.directory.search(peopleBase(ctx.config.directory), POSIX_ACCOUNT_FILTER, LISTED_ATTRIBUTES);
  const entries = hits.map(toEntry).filter((e): e is DirectoryEntry => e !== undefined);
  entries.sort((a, b) => a.uid.localeCompare(b.uid));
  if (!options.detailed) return { detailed: false, users: entries };

  const report: QuotaReport = await ctx.quota.fetchAllQuotas(ctx.config.home.base, await ctx.resolveFilesystem());
  const users: UserStatus[] = [];
  for (const entry of entries) {
    users.push({
      entry,
      credentialPresent: await checkCredential(ctx.realm, entry.uid),
      homeDirPresent: await checkHomeDirectory(ctx.config.home.base, entry.uid),
      quota: report.get(entry.uid),
    });
  }
  return { detailed: true, users };
}
