#!/usr/bin/env node
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { Command } from "commander";
import { registerAddFileCommand } from "./commands/add-file.js";
import { registerAddUserCommand } from "./commands/add-user.js";
import { registerListUsersCommand } from "./commands/list-users.js";
import { registerDeleteUserCommand } from "./commands/delete-user.js";

function packageVersion(): string {
  // src/cli.ts in development, dist/src/cli.js once built.
  const candidates = [join(__dirname, "..", "package.json"), join(__dirname, "..", "..", "package.json")];
  const path = candidates.find((p) => existsSync(p));
  if (!path) return "0.0.0";
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") return raw.version;
  return "0.0.0";
}

async function main() {
  const program = new Command();

  program
    .version(packageVersion())
    .name("useradmin")
    .description("Provision Unix accounts across LDAP, Kerberos, home directories and disk quotas")
    .option("-c, --config <path>", "config file (default: $USERADMIN_CONFIG, ~/.useradmin.yaml, ./useradmin.yaml)");

  registerAddFileCommand(program);
  registerAddUserCommand(program);
  registerListUsersCommand(program);
  registerDeleteUserCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
