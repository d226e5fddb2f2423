// Config loader: finds the YAML config, deep-merges it over DEFAULT_CONFIG and validates
// the result. On first run (no file anywhere) writes DEFAULT_CONFIG_YAML to the home
// location and reports firstRun: true so the CLI can stop and ask for an edit.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { AdminConfig } from "../types/config.js";
import { adminConfigSchema } from "./schema.js";
import { AdminError, AdminErrorCode, errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

export const HOME_CONFIG_PATH = join(homedir(), ".useradmin.yaml");
export const LOCAL_CONFIG_NAME = "useradmin.yaml";

export const DEFAULT_CONFIG: AdminConfig = {
  directory: {
    uri: "ldap://localhost:389",
    bind_dn: "cn=admin,dc=example,dc=local",
    bind_password: "",
    base_dn: "dc=example,dc=local",
    user_ou: "ou=people",
    group_ou: "ou=groups",
    login_shell: "/bin/bash",
  },
  realm: {
    name: "EXAMPLE.LOCAL",
    admin_principal: "admin/admin@EXAMPLE.LOCAL",
    admin_password: "",
    check_method: "kadmin",
  },
  home: { base: "/home", skel_dir: "/etc/skel", mode: "750" },
  quota: {
    filesystem_type: null,
    block_soft: "100M",
    block_hard: "200M",
    inode_soft: "1000",
    inode_hard: "2000",
  },
  execution: { command_timeout_ceiling: 0 },
  logging: { level: "info" },
};

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# useradmin configuration
# Generated automatically on first run. Edit before provisioning accounts.

directory:
  uri: ldap://localhost:389
  bind_dn: cn=admin,dc=example,dc=local
  bind_password: ""          # empty: prompted once per run
  base_dn: dc=example,dc=local
  user_ou: ou=people
  group_ou: ou=groups
  login_shell: /bin/bash

realm:
  name: EXAMPLE.LOCAL
  admin_principal: admin/admin@EXAMPLE.LOCAL
  admin_password: ""         # empty: prompted once per run
  check_method: kadmin       # kadmin | kadmin.local

home:
  base: /home
  skel_dir: /etc/skel
  mode: "750"

quota:
  filesystem_type: null      # xfs | ext4 | ext3 | ext2 (auto-detected when null)
  block_soft: 100M
  block_hard: 200M
  inode_soft: "1000"
  inode_hard: "2000"

execution:
  command_timeout_ceiling: 0 # seconds; 0 keeps the per-command defaults

logging:
  level: info
`;

export interface ConfigResult {
  config: AdminConfig;
  configPath: string;
  firstRun: boolean;
}

export interface ConfigLookup {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeConfigPath?: string;
}

/** First existing candidate wins; with none, the home path is where defaults get written. */
export function resolveConfigPath(lookup: ConfigLookup = {}): string {
  if (lookup.explicitPath) return resolve(lookup.explicitPath);
  const fromEnv = (lookup.env ?? process.env).USERADMIN_CONFIG;
  if (fromEnv) return resolve(fromEnv);
  const homePath = lookup.homeConfigPath ?? HOME_CONFIG_PATH;
  const localPath = join(lookup.cwd ?? process.cwd(), LOCAL_CONFIG_NAME);
  if (existsSync(homePath)) return homePath;
  if (existsSync(localPath)) return localPath;
  return homePath;
}

export function loadConfig(lookup: ConfigLookup = {}): ConfigResult {
  const configPath = resolveConfigPath(lookup);

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found; generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: errorMessage(err) }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new AdminError(AdminErrorCode.CONFIG_ERROR, `Cannot read config ${configPath}: ${errorMessage(err)}`, { configPath });
  }
  return { config: parseConfig(parsed, configPath), configPath, firstRun: false };
}

/** Merge a parsed YAML document over the defaults and validate it. */
export function parseConfig(document: unknown, source = "<inline>"): AdminConfig {
  const overrides = isPlainObject(document) ? document : {};
  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };
  const merged = deepMerge(defaults, overrides);
  const result = adminConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new AdminError(AdminErrorCode.CONFIG_ERROR, `Invalid config ${source}: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
