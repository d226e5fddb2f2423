import type { Command } from "commander";
import { confirm } from "@inquirer/prompts";
import { ensureContext, type GlobalOptions } from "../lib/setup.js";
import { theme } from "../lib/theme.js";
import { formatStepReport } from "../lib/format-results.js";
import { USERNAME_PATTERN } from "../provisioning/spec.js";
import { AdminError, AdminErrorCode } from "../shared/errors.js";

type DeleteUserOptions = {
  yes?: boolean;
};

export function registerDeleteUserCommand(program: Command) {
  program
    .command("delete-user")
    .description("Remove an account's LDAP entries, Kerberos principal and home directory (root only)")
    .argument("<username>")
    .option("-y, --yes", "do not ask for confirmation")
    .action(async (username: string, options: DeleteUserOptions, cmd: Command) => {
      try {
        await runDeleteUser(username, options, cmd.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

async function runDeleteUser(username: string, options: DeleteUserOptions, globals: GlobalOptions) {
  if (process.geteuid?.() !== 0) {
    throw new AdminError(AdminErrorCode.VALIDATION_ERROR, "delete-user must be run as root");
  }
  if (!USERNAME_PATTERN.test(username)) {
    throw new AdminError(AdminErrorCode.VALIDATION_ERROR, `Invalid username "${username}"`);
  }
  const { engine, home } = ensureContext(globals);

  if (!options.yes) {
    const proceed = await confirm({
      message: `Delete ${username} and remove ${home.pathFor(username)}?`,
      default: false,
    });
    if (!proceed) {
      console.log(theme.muted("Cancelled."));
      return;
    }
  }

  const result = await engine.deprovision(username);
  console.log(formatStepReport(result));
  if (!result.overall) process.exitCode = 1;
}
