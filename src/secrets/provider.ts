import type { AdminConfig } from "../types/config.js";
import { AdminError, AdminErrorCode } from "../shared/errors.js";

/** Which admin credential is being asked for. */
export type SecretKind = "directory" | "realm";

export interface SecretProvider {
  getSecret(kind: SecretKind): Promise<string>;
}

/** Asks an operator for a secret that the config leaves empty. */
export type SecretPrompt = (kind: SecretKind, message: string) => Promise<string>;

const PROMPT_MESSAGES: Record<SecretKind, string> = {
  directory: "Directory bind password",
  realm: "Kerberos admin password",
};

/**
 * Returns configured secrets; falls back to the prompt once per kind and
 * caches the answer for the rest of the run.
 */
export class ConfiguredSecretProvider implements SecretProvider {
  private readonly cache = new Map<SecretKind, Promise<string>>();

  constructor(
    private readonly configured: Record<SecretKind, string>,
    private readonly prompt?: SecretPrompt,
  ) {}

  static fromConfig(config: AdminConfig, prompt?: SecretPrompt): ConfiguredSecretProvider {
    return new ConfiguredSecretProvider(
      { directory: config.directory.bind_password, realm: config.realm.admin_password },
      prompt,
    );
  }

  getSecret(kind: SecretKind): Promise<string> {
    const value = this.configured[kind];
    if (value) return Promise.resolve(value);

    const cached = this.cache.get(kind);
    if (cached) return cached;

    const prompt = this.prompt;
    if (!prompt) {
      return Promise.reject(
        new AdminError(AdminErrorCode.CONFIG_ERROR, `No ${kind} password configured and no prompt available`, { kind }),
      );
    }
    const pending = prompt(kind, PROMPT_MESSAGES[kind]);
    this.cache.set(kind, pending);
    // A failed prompt may be retried by the next caller.
    pending.catch(() => this.cache.delete(kind));
    return pending;
  }
}
