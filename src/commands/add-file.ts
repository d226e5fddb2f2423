import type { Command } from "commander";
import { ensureContext, type GlobalOptions } from "../lib/setup.js";
import { theme, formatSectionHeader } from "../lib/theme.js";
import { formatStepReport, formatSummary } from "../lib/format-results.js";
import { processFile } from "../batch/manifest.js";
import { addStepOptions, resolveSteps, type StepOptions } from "./step-options.js";

export function registerAddFileCommand(program: Command) {
  const command = program
    .command("add-file")
    .description("Provision every account listed in a manifest file")
    .argument("<file>", "manifest: uid groups username surname firstname password, one account per line");
  addStepOptions(command).action(async (file: string, options: StepOptions, cmd: Command) => {
    try {
      await runAddFile(file, options, cmd.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      if (error instanceof Error) {
        console.error(theme.error(`\nError: ${error.message}`));
      }
      process.exit(1);
    }
  });
}

async function runAddFile(file: string, options: StepOptions, globals: GlobalOptions) {
  const steps = resolveSteps(options);
  const { engine } = ensureContext(globals);

  let unreadable = false;
  console.log(formatSectionHeader(`Provisioning from ${file} (${steps.join(", ")})`));
  const results = await processFile(file, steps, engine, {
    onResult: (result) => console.log(`  ${formatStepReport(result)}`),
    onUnreadable: (error) => {
      unreadable = true;
      console.error(theme.error(error.message));
    },
  });

  if (unreadable) {
    process.exitCode = 1;
    return;
  }
  console.log(`\n${formatSummary(results)}`);
  if ([...results.values()].some((ok) => !ok)) process.exitCode = 1;
}
