import type { AdminConfig } from "../types/config.js";
import type { DirectoryAttributes } from "../types/directory.js";
import type { ProvisioningSpec } from "../types/account.js";
import { homePathFor } from "../home/paths.js";

type DirectoryLayout = AdminConfig["directory"];

export function userDn(layout: DirectoryLayout, username: string): string {
  return `uid=${username},${layout.user_ou},${layout.base_dn}`;
}

export function groupDn(layout: DirectoryLayout, group: string): string {
  return `cn=${group},${layout.group_ou},${layout.base_dn}`;
}

/** Search base holding every posix account. */
export function peopleBase(layout: DirectoryLayout): string {
  return `${layout.user_ou},${layout.base_dn}`;
}

/** Primary group: one per user, named after it, gidNumber equal to the uidNumber. */
export function primaryGroupAttributes(spec: ProvisioningSpec): DirectoryAttributes {
  return {
    objectClass: ["top", "posixGroup"],
    cn: spec.username,
    gidNumber: String(spec.uidNumber),
    memberUid: spec.username,
    description: `Primary group for user ${spec.username}`,
  };
}

export function userAttributes(spec: ProvisioningSpec, config: AdminConfig): DirectoryAttributes {
  const fullName = `${spec.firstname} ${spec.surname}`;
  return {
    objectClass: ["top", "person", "organizationalPerson", "inetOrgPerson", "posixAccount", "shadowAccount"],
    uid: spec.username,
    uidNumber: String(spec.uidNumber),
    gidNumber: String(spec.uidNumber),
    cn: fullName,
    sn: spec.surname,
    givenName: spec.firstname,
    homeDirectory: homePathFor(config.home.base, spec.username),
    loginShell: config.directory.login_shell,
    description: `User ${spec.username} (${fullName})`,
  };
}
