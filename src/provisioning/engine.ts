// Provisioning engine: turns one ProvisioningSpec into directory entries, a realm
// principal, a home directory and a disk quota, one isolated step at a time.
import type { AdminConfig } from "../types/config.js";
import type { DirectoryAttributes, DirectoryService } from "../types/directory.js";
import type { CredentialRealm } from "../types/realm.js";
import type { FilesystemType, QuotaLimits } from "../types/quota.js";
import {
  DEPROVISION_STEP_ORDER,
  type DeprovisionResult,
  type DeprovisionStepName,
  type ProvisioningResult,
  type ProvisioningSpec,
  type StepName,
  type StepOutcome,
} from "../types/account.js";
import { groupDn, primaryGroupAttributes, userAttributes, userDn } from "../directory/entries.js";
import type { HomeDirectoryManager } from "../home/home-directory.js";
import type { QuotaBackend } from "../quota/backend.js";
import { isAdminError, AdminErrorCode } from "../shared/errors.js";
import { runSteps, type StepPlan } from "./steps.js";
import { logger } from "../logger.js";

const NOTHING_RUN: Readonly<Record<StepName, StepOutcome>> = {
  directory: "skipped",
  credential: "skipped",
  home: "skipped",
  quota: "skipped",
};

const NOTHING_REMOVED: Readonly<Record<DeprovisionStepName, StepOutcome>> = {
  directory: "skipped",
  credential: "skipped",
  home: "skipped",
};

export interface EngineDependencies {
  readonly config: AdminConfig;
  readonly directory: DirectoryService;
  readonly realm: CredentialRealm;
  readonly home: HomeDirectoryManager;
  readonly quota: QuotaBackend;
  readonly resolveFilesystem: () => Promise<FilesystemType>;
}

export function quotaLimitsFrom(config: AdminConfig): QuotaLimits {
  return {
    blockSoft: config.quota.block_soft,
    blockHard: config.quota.block_hard,
    inodeSoft: config.quota.inode_soft,
    inodeHard: config.quota.inode_hard,
  };
}

export class ProvisioningEngine {
  constructor(private readonly deps: EngineDependencies) {}

  async provision(spec: ProvisioningSpec): Promise<ProvisioningResult> {
    logger.info({ username: spec.username, steps: spec.steps }, "Provisioning account");
    const plan: StepPlan<StepName> = [
      ["directory", () => this.provisionDirectory(spec)],
      ["credential", () => this.provisionCredential(spec)],
      ["home", () => this.provisionHome(spec)],
      ["quota", () => this.provisionQuota(spec)],
    ];
    const result = await runSteps(spec.username, plan, spec.steps, NOTHING_RUN);
    logger.info({ username: spec.username, outcomes: result.outcomes, overall: result.overall }, "Provisioning finished");
    return result;
  }

  async deprovision(username: string, steps: readonly DeprovisionStepName[] = DEPROVISION_STEP_ORDER): Promise<DeprovisionResult> {
    logger.info({ username, steps }, "Deprovisioning account");
    const plan: StepPlan<DeprovisionStepName> = [
      ["directory", () => this.removeDirectoryEntries(username)],
      ["credential", () => this.removeCredential(username)],
      ["home", () => this.removeHome(username)],
    ];
    const result = await runSteps(username, plan, steps, NOTHING_REMOVED);
    logger.info({ username, outcomes: result.outcomes, overall: result.overall }, "Deprovisioning finished");
    return result;
  }

  private async provisionDirectory(spec: ProvisioningSpec): Promise<boolean> {
    const { config, directory } = this.deps;
    await this.ensureEntry(groupDn(config.directory, spec.username), primaryGroupAttributes(spec));
    await this.ensureEntry(userDn(config.directory, spec.username), userAttributes(spec, config));

    for (const group of spec.groups) {
      if (group === spec.username) continue;
      const dn = groupDn(config.directory, group);
      if (!(await directory.exists(dn))) {
        logger.warn({ username: spec.username, group: dn }, "Group does not exist; membership skipped");
        continue;
      }
      await directory.addGroupMember(dn, spec.username);
      logger.info({ username: spec.username, group: dn }, "Added to group");
    }
    return true;
  }

  /** Create the entry unless it is already there; existing entries are left untouched. */
  private async ensureEntry(dn: string, attributes: DirectoryAttributes): Promise<void> {
    const { directory } = this.deps;
    if (await directory.exists(dn)) {
      logger.info({ dn }, "Entry already exists; left unchanged");
      return;
    }
    try {
      await directory.create(dn, attributes);
      logger.info({ dn }, "Entry created");
    } catch (err) {
      if (!isAdminError(err, AdminErrorCode.ALREADY_EXISTS)) throw err;
      logger.info({ dn }, "Entry appeared concurrently; left unchanged");
    }
  }

  private async provisionCredential(spec: ProvisioningSpec): Promise<boolean> {
    await this.deps.realm.createPrincipal(spec.username, spec.password);
    return true;
  }

  private async provisionHome(spec: ProvisioningSpec): Promise<boolean> {
    await this.deps.home.create(spec.username);
    return true;
  }

  private async provisionQuota(spec: ProvisioningSpec): Promise<boolean> {
    const { config, quota, resolveFilesystem } = this.deps;
    const fsType = await resolveFilesystem();
    return quota.setUserQuota(spec.username, config.home.base, fsType, quotaLimitsFrom(config));
  }

  private async removeDirectoryEntries(username: string): Promise<boolean> {
    const layout = this.deps.config.directory;
    await this.removeEntry(userDn(layout, username));
    await this.removeEntry(groupDn(layout, username));
    return true;
  }

  private async removeEntry(dn: string): Promise<void> {
    const { directory } = this.deps;
    if (!(await directory.exists(dn))) {
      logger.info({ dn }, "Entry not present; nothing to delete");
      return;
    }
    try {
      await directory.delete(dn);
      logger.info({ dn }, "Entry deleted");
    } catch (err) {
      if (!isAdminError(err, AdminErrorCode.NOT_FOUND)) throw err;
      logger.info({ dn }, "Entry vanished before deletion");
    }
  }

  private async removeCredential(username: string): Promise<boolean> {
    await this.deps.realm.deletePrincipal(username);
    return true;
  }

  private async removeHome(username: string): Promise<boolean> {
    const removed = await this.deps.home.remove(username);
    if (!removed) logger.info({ username }, "No home directory to remove");
    return true;
  }
}
