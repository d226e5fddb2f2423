import type { FilesystemType } from "./quota.js";

/** Credential-check tool: remote kadmin, or kadmin.local when running as root on the KDC. */
export type RealmCheckMethod = "kadmin" | "kadmin.local";

/** Full useradmin configuration. */
export interface AdminConfig {
  directory: {
    uri: string;
    bind_dn: string;
    bind_password: string;
    base_dn: string;
    user_ou: string;
    group_ou: string;
    login_shell: string;
  };
  realm: {
    name: string;
    admin_principal: string;
    admin_password: string;
    check_method: RealmCheckMethod;
  };
  home: {
    base: string;
    skel_dir: string;
    /** Octal permission string, e.g. "750". */
    mode: string;
  };
  quota: {
    filesystem_type: FilesystemType | null;
    block_soft: string;
    block_hard: string;
    inode_soft: string;
    inode_hard: string;
  };
  execution: {
    command_timeout_ceiling: number;
  };
  logging: {
    level: string;
  };
}
