import type { Command } from "commander";
import { ensureContext, type GlobalOptions } from "../lib/setup.js";
import { formatPresence, theme } from "../lib/theme.js";
import { renderTable } from "../lib/table.js";
import { listUsers, type UserListing } from "../status/listing.js";
import { renderQuota } from "../quota/render.js";
import { QUOTA_NOT_SET } from "../types/quota.js";

interface ListUsersOptions {
  detailed?: boolean;
}

export function registerListUsersCommand(program: Command) {
  program
    .command("list-users")
    .description("List posix accounts in the directory")
    .option("-d, --detailed", "also check Kerberos principal, home directory and quota")
    .action(async (options: ListUsersOptions, cmd: Command) => {
      try {
        await runListUsers(options, cmd.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

async function runListUsers(options: ListUsersOptions, globals: GlobalOptions) {
  const ctx = ensureContext(globals);
  const listing = await listUsers(ctx, { detailed: options.detailed === true });
  if (listing.users.length === 0) {
    console.log(theme.muted("\nNo accounts found."));
    return;
  }
  renderTable(listingTable(listing));
  console.log(theme.muted(`\n  ${listing.users.length} account(s)`));
}

export function listingTable(listing: UserListing): { headers: string[]; rows: string[][] } {
  if (!listing.detailed) {
    return {
      headers: ["USER", "UID", "NAME", "HOME"],
      rows: listing.users.map((u) => [u.uid, u.uidNumber, u.cn, u.homeDirectory]),
    };
  }
  return {
    headers: ["USER", "UID", "NAME", "KERBEROS", "HOME DIR", "QUOTA"],
    rows: listing.users.map((s) => [
      s.entry.uid,
      s.entry.uidNumber,
      s.entry.cn,
      formatPresence(s.credentialPresent),
      formatPresence(s.homeDirPresent),
      s.quota ? renderQuota(s.quota) : QUOTA_NOT_SET,
    ]),
  };
}
