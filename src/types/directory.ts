/** LDAP attribute map; multi-valued attributes are arrays. */
export type DirectoryAttributes = Record<string, string | readonly string[]>;

/** Posix account row as returned by a directory search. */
export interface DirectoryEntry {
  readonly uid: string;
  readonly uidNumber: string;
  readonly cn: string;
  readonly homeDirectory: string;
}

/** Raw search hit: DN plus every returned attribute value. */
export interface DirectorySearchHit {
  readonly dn: string;
  readonly attributes: Record<string, string[]>;
}

/**
 * Directory-service operations the provisioning core needs.
 * Absence is a normal answer: `exists` returns false rather than throwing.
 */
export interface DirectoryService {
  exists(dn: string): Promise<boolean>;
  /** Throws AdminError ALREADY_EXISTS when the entry is already present. */
  create(dn: string, attributes: DirectoryAttributes): Promise<void>;
  /** Adding a member that is already present is a no-op. */
  addGroupMember(groupDn: string, username: string): Promise<void>;
  /** Throws AdminError NOT_FOUND when the entry does not exist. */
  delete(dn: string): Promise<void>;
  search(baseDn: string, filter: string, attributes: readonly string[]): Promise<DirectorySearchHit[]>;
}
