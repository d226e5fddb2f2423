import { password } from "@inquirer/prompts";
import type { SecretPrompt } from "./provider.js";

/** Interactive masked prompt on the controlling terminal. */
export const terminalSecretPrompt: SecretPrompt = (_kind, message) =>
  password({ message: `${message}:`, mask: "*" });
