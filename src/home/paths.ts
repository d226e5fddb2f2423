import { posix } from "node:path";

/** Home directory of an account under the configured base. */
export function homePathFor(base: string, username: string): string {
  return posix.join(base, username);
}
