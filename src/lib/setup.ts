import { loadConfig } from "../config/loader.js";
import { createAdminContext, type AdminContext } from "../context.js";
import { terminalSecretPrompt } from "../secrets/prompt.js";
import { setLogLevel } from "../logger.js";
import { theme } from "./theme.js";

export type GlobalOptions = {
  config?: string;
};

/**
 * Load the config and wire the subsystems. On first run the default config has just
 * been written, so the command stops here and asks for it to be edited.
 */
export function ensureContext(options: GlobalOptions): AdminContext {
  const { config, configPath, firstRun } = loadConfig({ explicitPath: options.config });
  if (firstRun) {
    console.error(theme.warning(`Created a default configuration at ${configPath}.`));
    console.error(theme.muted("Edit it for your directory, realm and filesystem, then run the command again."));
    process.exit(1);
  }
  setLogLevel(config.logging.level);
  return createAdminContext(config, { prompt: terminalSecretPrompt });
}
