import { z } from "zod";
import type { AdminConfig } from "../types/config.js";
import { SUPPORTED_FILESYSTEMS } from "../types/quota.js";

/** A blank YAML value (`bind_password:`) means "ask at run time". */
const optionalSecret = z
  .union([z.string(), z.number(), z.null()])
  .transform((v) => (v === null ? "" : String(v)));

/** Quota limit as accepted by xfs_quota/setquota: a count with an optional K/M/G/T suffix. */
const quotaLimit = z.coerce.string().regex(/^\d+[KMGTkmgt]?$/, "expected a number with an optional K/M/G/T suffix");

export const adminConfigSchema: z.ZodType<AdminConfig, z.ZodTypeDef, unknown> = z.object({
  directory: z.object({
    uri: z.string().min(1),
    bind_dn: z.string().min(1),
    bind_password: optionalSecret,
    base_dn: z.string().min(1),
    user_ou: z.string().min(1),
    group_ou: z.string().min(1),
    login_shell: z.string().min(1),
  }),
  realm: z.object({
    name: z.string().min(1),
    admin_principal: z.string().min(1),
    admin_password: optionalSecret,
    check_method: z.enum(["kadmin", "kadmin.local"]),
  }),
  home: z.object({
    base: z.string().min(1),
    skel_dir: z.string().min(1),
    mode: z.coerce.string().regex(/^[0-7]{3,4}$/, "expected an octal mode such as 750"),
  }),
  quota: z.object({
    filesystem_type: z.enum(SUPPORTED_FILESYSTEMS).nullable(),
    block_soft: quotaLimit,
    block_hard: quotaLimit,
    inode_soft: quotaLimit,
    inode_hard: quotaLimit,
  }),
  execution: z.object({
    command_timeout_ceiling: z.number().int().min(0),
  }),
  logging: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  }),
});
