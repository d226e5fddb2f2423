// DirectoryService backed by the OpenLDAP client tools. Every call performs a simple
// bind with the configured admin DN; the bind password comes from the SecretProvider.
import type { AdminConfig } from "../types/config.js";
import type { Command } from "../types/command.js";
import type { DirectoryAttributes, DirectorySearchHit, DirectoryService } from "../types/directory.js";
import { resolveTimeout, type DurationCategory } from "../types/duration.js";
import type { Executor, ExecResult } from "../execution/executor.js";
import type { SecretProvider } from "../secrets/provider.js";
import { AdminError, AdminErrorCode } from "../shared/errors.js";
import { parseLdif, renderAddRecord, renderAddValuesRecord } from "./ldif.js";
import { logger } from "../logger.js";

/** LDAP result codes the adapter interprets; everything else is a subsystem failure. */
export const LdapResultCode = {
  SUCCESS: 0,
  TYPE_OR_VALUE_EXISTS: 20,
  NO_SUCH_OBJECT: 32,
  ALREADY_EXISTS: 68,
} as const;

export class LdapToolsDirectory implements DirectoryService {
  constructor(
    private readonly executor: Executor,
    private readonly layout: AdminConfig["directory"],
    private readonly secrets: SecretProvider,
    private readonly timeoutCeiling = 0,
  ) {}

  private async bindArgs(): Promise<string[]> {
    const password = await this.secrets.getSecret("directory");
    return ["-x", "-H", this.layout.uri, "-D", this.layout.bind_dn, "-w", password];
  }

  private run(command: Command, duration: DurationCategory = "quick"): Promise<ExecResult> {
    return this.executor.execute(command, resolveTimeout(duration, this.timeoutCeiling));
  }

  private failure(action: string, dn: string, result: ExecResult): AdminError {
    const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
    return new AdminError(AdminErrorCode.SUBSYSTEM_UNAVAILABLE, `Directory ${action} failed for ${dn}: ${detail}`, {
      dn,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    });
  }

  async exists(dn: string): Promise<boolean> {
    const argv = ["ldapsearch", ...(await this.bindArgs()), "-LLL", "-s", "base", "-b", dn, "(objectClass=*)", "dn"];
    const r = await this.run({ argv }, "instant");
    if (r.exitCode === LdapResultCode.SUCCESS) return true;
    if (r.exitCode === LdapResultCode.NO_SUCH_OBJECT) return false;
    throw this.failure("lookup", dn, r);
  }

  async create(dn: string, attributes: DirectoryAttributes): Promise<void> {
    const argv = ["ldapadd", ...(await this.bindArgs())];
    const r = await this.run({ argv, stdin: renderAddRecord(dn, attributes) });
    if (r.exitCode === LdapResultCode.SUCCESS) return;
    if (r.exitCode === LdapResultCode.ALREADY_EXISTS) {
      throw new AdminError(AdminErrorCode.ALREADY_EXISTS, `Entry already exists: ${dn}`, { dn });
    }
    throw this.failure("add", dn, r);
  }

  async addGroupMember(groupDn: string, username: string): Promise<void> {
    const argv = ["ldapmodify", ...(await this.bindArgs())];
    const r = await this.run({ argv, stdin: renderAddValuesRecord(groupDn, "memberUid", [username]) });
    if (r.exitCode === LdapResultCode.SUCCESS) return;
    if (r.exitCode === LdapResultCode.TYPE_OR_VALUE_EXISTS) {
      logger.debug({ groupDn, username }, "Already a group member");
      return;
    }
    throw this.failure("modify", groupDn, r);
  }

  async delete(dn: string): Promise<void> {
    const argv = ["ldapdelete", ...(await this.bindArgs()), dn];
    const r = await this.run({ argv });
    if (r.exitCode === LdapResultCode.SUCCESS) return;
    if (r.exitCode === LdapResultCode.NO_SUCH_OBJECT) {
      throw new AdminError(AdminErrorCode.NOT_FOUND, `No such entry: ${dn}`, { dn });
    }
    throw this.failure("delete", dn, r);
  }

  async search(baseDn: string, filter: string, attributes: readonly string[]): Promise<DirectorySearchHit[]> {
    const argv = ["ldapsearch", ...(await this.bindArgs()), "-LLL", "-o", "ldif-wrap=no", "-b", baseDn, filter, ...attributes];
    const r = await this.run({ argv }, "normal");
    if (r.exitCode === LdapResultCode.NO_SUCH_OBJECT) return [];
    if (r.exitCode !== LdapResultCode.SUCCESS) throw this.failure("search", baseDn, r);
    return parseLdif(r.stdout);
  }
}
