/** Credential-realm operations the provisioning core needs (Kerberos principals). */
export interface CredentialRealm {
  principalFor(username: string): string;
  /** Creating a principal that already exists is a no-op. */
  createPrincipal(username: string, password: string): Promise<void>;
  /** Deleting a principal that does not exist is a no-op. */
  deletePrincipal(username: string): Promise<void>;
  hasPrincipal(username: string): Promise<boolean>;
}
