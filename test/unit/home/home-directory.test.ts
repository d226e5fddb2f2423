import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { HomeDirectoryManager } from '../../../src/home/home-directory.js';
import type { AccountIdLookup } from '../../../src/home/id-lookup.js';

describe('HomeDirectoryManager', () => {
  let tmpDir: string;
  let base: string;
  let skel: string;

  const ownIds: AccountIdLookup = async () => ({ uid: process.getuid?.() ?? 0, gid: process.getgid?.() ?? 0 });
  const unknownAccount: AccountIdLookup = async () => undefined;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'useradmin-home-test-'));
    base = path.join(tmpDir, 'home');
    skel = path.join(tmpDir, 'skel');
    await fs.mkdir(path.join(skel, '.config', 'app'), { recursive: true });
    await fs.writeFile(path.join(skel, '.bashrc'), 'export EDITOR=vi\n');
    await fs.writeFile(path.join(skel, '.config', 'app', 'settings'), 'theme=dark\n');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates the directory with the configured mode and copies the skeleton', async () => {
    const manager = new HomeDirectoryManager({ base, skel_dir: skel, mode: '750' }, ownIds);

    const home = await manager.create('alice');

    expect(home).toBe(path.join(base, 'alice'));
    expect((await fs.stat(home)).mode & 0o777).toBe(0o750);
    expect(await fs.readFile(path.join(home, '.bashrc'), 'utf-8')).toBe('export EDITOR=vi\n');
    expect(await fs.readFile(path.join(home, '.config', 'app', 'settings'), 'utf-8')).toBe('theme=dark\n');
  });

  it('merges into an existing home, overwriting colliding files and keeping others', async () => {
    const home = path.join(base, 'alice');
    await fs.mkdir(home, { recursive: true });
    await fs.writeFile(path.join(home, '.bashrc'), 'old\n');
    await fs.writeFile(path.join(home, 'notes.txt'), 'keep\n');
    const manager = new HomeDirectoryManager({ base, skel_dir: skel, mode: '700' }, ownIds);

    await manager.create('alice');

    expect(await fs.readFile(path.join(home, '.bashrc'), 'utf-8')).toBe('export EDITOR=vi\n');
    expect(await fs.readFile(path.join(home, 'notes.txt'), 'utf-8')).toBe('keep\n');
    expect((await fs.stat(home)).mode & 0o777).toBe(0o700);
  });

  it('still creates the directory when the skeleton is missing', async () => {
    const manager = new HomeDirectoryManager({ base, skel_dir: path.join(tmpDir, 'nope'), mode: '750' }, ownIds);

    const home = await manager.create('bob');

    expect(await fs.readdir(home)).toEqual([]);
  });

  it('fails when the skeleton path is not a directory', async () => {
    const notADir = path.join(tmpDir, 'skel.txt');
    await fs.writeFile(notADir, 'x');
    const manager = new HomeDirectoryManager({ base, skel_dir: notADir, mode: '750' }, ownIds);

    await expect(manager.create('dave')).rejects.toMatchObject({ code: 'ENOTDIR' });
  });

  it('skips the ownership change when the account does not resolve', async () => {
    const lookup = jest.fn(unknownAccount);
    const manager = new HomeDirectoryManager({ base, skel_dir: skel, mode: '750' }, lookup);

    await expect(manager.create('carol')).resolves.toBe(path.join(base, 'carol'));
    expect(lookup).toHaveBeenCalledWith('carol');
  });

  it('removes a home directory and reports whether one existed', async () => {
    const manager = new HomeDirectoryManager({ base, skel_dir: skel, mode: '750' }, ownIds);
    await manager.create('dave');

    expect(await manager.remove('dave')).toBe(true);
    expect(await manager.exists('dave')).toBe(false);
    expect(await manager.remove('dave')).toBe(false);
  });
});
