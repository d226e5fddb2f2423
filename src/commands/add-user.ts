import type { Command } from "commander";
import { ensureContext, type GlobalOptions } from "../lib/setup.js";
import { theme } from "../lib/theme.js";
import { formatStepReport } from "../lib/format-results.js";
import { createProvisioningSpec, parseGroupList } from "../provisioning/spec.js";
import { AdminError, AdminErrorCode } from "../shared/errors.js";
import { addStepOptions, resolveSteps, type StepOptions } from "./step-options.js";

export function registerAddUserCommand(program: Command) {
  const command = program
    .command("add-user")
    .description("Provision a single account")
    .argument("<uid>", "numeric uid (also the primary group gid)")
    .argument("<groups>", "comma-separated supplementary groups")
    .argument("<username>")
    .argument("<surname>")
    .argument("<firstname>")
    .argument("<password>");
  addStepOptions(command).action(
    async (
      uid: string,
      groups: string,
      username: string,
      surname: string,
      firstname: string,
      password: string,
      options: StepOptions,
      cmd: Command,
    ) => {
      try {
        await runAddUser({ uid, groups, username, surname, firstname, password }, options, cmd.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    },
  );
}

interface AddUserArgs {
  uid: string;
  groups: string;
  username: string;
  surname: string;
  firstname: string;
  password: string;
}

async function runAddUser(args: AddUserArgs, options: StepOptions, globals: GlobalOptions) {
  if (!/^\d+$/.test(args.uid)) {
    throw new AdminError(AdminErrorCode.VALIDATION_ERROR, `uid must be a positive integer, got "${args.uid}"`);
  }
  const spec = createProvisioningSpec({
    uidNumber: Number.parseInt(args.uid, 10),
    username: args.username,
    surname: args.surname,
    firstname: args.firstname,
    password: args.password,
    groups: parseGroupList(args.groups),
    steps: resolveSteps(options),
  });
  const { engine } = ensureContext(globals);

  const result = await engine.provision(spec);
  console.log(formatStepReport(result));
  if (!result.overall) process.exitCode = 1;
}
