// Home-directory subsystem: create, apply mode, merge the skeleton tree, hand ownership
// to the account. Operates on the local (or NFS-mounted) filesystem directly.
import { chmod, chown, cp, lchown, mkdir, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import type { AdminConfig } from "../types/config.js";
import type { AccountIdLookup, AccountIds } from "./id-lookup.js";
import { homePathFor } from "./paths.js";
import { checkHomeDirectory } from "../status/checkers.js";
import { logger } from "../logger.js";

function isErrno(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

export class HomeDirectoryManager {
  constructor(
    private readonly options: AdminConfig["home"],
    private readonly lookupIds: AccountIdLookup,
  ) {}

  pathFor(username: string): string {
    return homePathFor(this.options.base, username);
  }

  /** Create (or complete) the home directory. Throws on filesystem failures. */
  async create(username: string): Promise<string> {
    const home = this.pathFor(username);
    await mkdir(home, { recursive: true });
    await chmod(home, Number.parseInt(this.options.mode, 8));
    await this.copySkeleton(home);

    const ids = await this.lookupIds(username);
    if (ids) {
      await chownTree(home, ids);
    } else {
      logger.warn({ username, home }, "Account not resolvable on this host yet; skipping ownership change");
    }
    logger.info({ username, home }, "Home directory ready");
    return home;
  }

  /** Merge the skeleton tree into the home directory, overwriting colliding files. */
  private async copySkeleton(home: string): Promise<void> {
    const skel = this.options.skel_dir;
    let entries: string[];
    try {
      entries = await readdir(skel);
    } catch (err) {
      if (isErrno(err, "ENOENT")) {
        logger.warn({ skel }, "Skeleton directory missing; nothing copied");
        return;
      }
      throw err;
    }
    for (const entry of entries) {
      await cp(join(skel, entry), join(home, entry), {
        recursive: true,
        force: true,
        errorOnExist: false,
        preserveTimestamps: true,
        verbatimSymlinks: true,
      });
    }
  }

  exists(username: string): Promise<boolean> {
    return checkHomeDirectory(this.options.base, username);
  }

  /** Remove the home directory tree; returns false when there was nothing to remove. */
  async remove(username: string): Promise<boolean> {
    const home = this.pathFor(username);
    if (!(await this.exists(username))) return false;
    await rm(home, { recursive: true, force: true });
    logger.info({ username, home }, "Home directory removed");
    return true;
  }
}

/** chown a tree without following symlinks out of it. */
export async function chownTree(root: string, ids: AccountIds): Promise<void> {
  await chown(root, ids.uid, ids.gid);
  const entries = await readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(root, entry.name);
    if (entry.isDirectory()) {
      await chownTree(path, ids);
    } else if (entry.isSymbolicLink()) {
      await lchown(path, ids.uid, ids.gid);
    } else {
      await chown(path, ids.uid, ids.gid);
    }
  }
}
