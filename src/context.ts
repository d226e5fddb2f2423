// Wires the subsystem adapters for one CLI run from the loaded configuration.
import type { AdminConfig, CredentialRealm, DirectoryService, FilesystemType } from "./types/index.js";
import { LocalExecutor, type Executor } from "./execution/executor.js";
import { ConfiguredSecretProvider, type SecretPrompt, type SecretProvider } from "./secrets/provider.js";
import { LdapToolsDirectory } from "./directory/ldap-tools.js";
import { KadminRealm } from "./realm/kadmin.js";
import { HomeDirectoryManager } from "./home/home-directory.js";
import { getentIdLookup } from "./home/id-lookup.js";
import { QuotaBackend } from "./quota/backend.js";
import { filesystemResolver } from "./quota/filesystem.js";
import { ProvisioningEngine } from "./provisioning/engine.js";

export interface AdminContext {
  readonly config: AdminConfig;
  readonly executor: Executor;
  readonly secrets: SecretProvider;
  readonly directory: DirectoryService;
  readonly realm: CredentialRealm;
  readonly home: HomeDirectoryManager;
  readonly quota: QuotaBackend;
  readonly resolveFilesystem: () => Promise<FilesystemType>;
  readonly engine: ProvisioningEngine;
}

export interface ContextOptions {
  readonly executor?: Executor;
  readonly prompt?: SecretPrompt;
  readonly effectiveUid?: number;
}

export function createAdminContext(config: AdminConfig, options: ContextOptions = {}): AdminContext {
  const ceiling = config.execution.command_timeout_ceiling;
  const executor = options.executor ?? new LocalExecutor();
  const secrets = ConfiguredSecretProvider.fromConfig(config, options.prompt);
  const directory = new LdapToolsDirectory(executor, config.directory, secrets, ceiling);
  const realm = new KadminRealm(executor, secrets, { realm: config.realm, timeoutCeiling: ceiling, effectiveUid: options.effectiveUid });
  const home = new HomeDirectoryManager(config.home, getentIdLookup(executor, ceiling));
  const quota = new QuotaBackend(executor, ceiling);
  const resolveFilesystem = filesystemResolver(executor, config.home.base, config.quota.filesystem_type, ceiling);
  const engine = new ProvisioningEngine({ config, directory, realm, home, quota, resolveFilesystem });
  return { config, executor, secrets, directory, realm, home, quota, resolveFilesystem, engine };
}
