// Kerberos realm adapter. Queries go through `kadmin -p <admin> -w <secret> -q <query>`,
// or through `kadmin.local -q <query>` when configured and running as root on the KDC.
import type { AdminConfig } from "../types/config.js";
import type { Command } from "../types/command.js";
import { resolveTimeout } from "../types/duration.js";
import type { Executor, ExecResult } from "../execution/executor.js";
import type { CredentialRealm } from "../types/realm.js";
import type { SecretProvider } from "../secrets/provider.js";
import { AdminError, AdminErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface RealmOptions {
  readonly realm: AdminConfig["realm"];
  readonly timeoutCeiling?: number;
  /** Effective uid of this process; kadmin.local is only usable as root. */
  readonly effectiveUid?: number;
}

export class KadminRealm implements CredentialRealm {
  private readonly realm: AdminConfig["realm"];
  private readonly timeoutCeiling: number;
  private readonly useLocal: boolean;

  constructor(
    private readonly executor: Executor,
    private readonly secrets: SecretProvider,
    options: RealmOptions,
  ) {
    this.realm = options.realm;
    this.timeoutCeiling = options.timeoutCeiling ?? 0;
    const euid = options.effectiveUid ?? process.geteuid?.();
    this.useLocal = this.realm.check_method === "kadmin.local" && euid === 0;
  }

  principalFor(username: string): string {
    return `${username}@${this.realm.name}`;
  }

  private async query(query: string): Promise<ExecResult> {
    let command: Command;
    if (this.useLocal) {
      command = { argv: ["kadmin.local", "-q", query] };
    } else {
      const password = await this.secrets.getSecret("realm");
      command = { argv: ["kadmin", "-p", this.realm.admin_principal, "-w", password, "-q", query] };
    }
    return this.executor.execute(command, resolveTimeout("quick", this.timeoutCeiling));
  }

  /** Create a principal; an existing principal is left as it is. */
  async createPrincipal(username: string, password: string): Promise<void> {
    const principal = this.principalFor(username);
    const r = await this.query(`addprinc -pw "${password}" ${principal}`);
    // kadmin reports per-query errors on stderr, sometimes with exit code 0.
    if (/already exists/i.test(r.stderr)) {
      logger.warn({ principal }, "Principal already exists; leaving it unchanged");
      return;
    }
    if (r.exitCode !== 0 || /^add_principal:/im.test(r.stderr)) {
      throw new AdminError(AdminErrorCode.SUBSYSTEM_UNAVAILABLE, `kadmin addprinc failed for ${principal}: ${r.stderr.trim() || `exit code ${r.exitCode}`}`, {
        principal,
        exitCode: r.exitCode,
      });
    }
    logger.info({ principal }, "Principal created");
  }

  /** Delete a principal; a missing principal is a no-op. */
  async deletePrincipal(username: string): Promise<void> {
    const principal = this.principalFor(username);
    const r = await this.query(`delprinc -force ${principal}`);
    if (/does not exist|not found/i.test(r.stderr)) {
      logger.info({ principal }, "Principal not present; nothing to delete");
      return;
    }
    if (r.exitCode !== 0 || /^delete_principal:/im.test(r.stderr)) {
      throw new AdminError(AdminErrorCode.SUBSYSTEM_UNAVAILABLE, `kadmin delprinc failed for ${principal}: ${r.stderr.trim() || `exit code ${r.exitCode}`}`, {
        principal,
        exitCode: r.exitCode,
      });
    }
    logger.info({ principal }, "Principal deleted");
  }

  /**
   * getprinc output for the principal. Exit code 0 alone proves nothing: a bad admin
   * password or a malformed query can still exit 0 with an empty body.
   */
  async hasPrincipal(username: string): Promise<boolean> {
    const principal = this.principalFor(username);
    const r = await this.query(`getprinc ${principal}`);
    if (r.exitCode !== 0) {
      logger.debug({ principal, exitCode: r.exitCode, stderr: r.stderr.trim() }, "getprinc failed");
    }
    return r.exitCode === 0 && r.stdout.includes(`Principal: ${principal}`);
  }
}
