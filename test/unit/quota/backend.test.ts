import { QuotaBackend } from '../../../src/quota/backend.js';
import { FakeExecutor } from '../support/fake-executor.js';

const LIMITS = { blockSoft: '100M', blockHard: '200M', inodeSoft: '1000', inodeHard: '2000' };

describe('QuotaBackend.setUserQuota', () => {
  it('drives xfs_quota in expert mode for xfs', async () => {
    const executor = new FakeExecutor();
    const ok = await new QuotaBackend(executor).setUserQuota('alice', '/home', 'xfs', LIMITS);

    expect(ok).toBe(true);
    expect(executor.commands[0]?.argv).toEqual([
      'xfs_quota',
      '-x',
      '-c',
      'limit bsoft=100M bhard=200M isoft=1000 ihard=2000 alice',
      '/home',
    ]);
  });

  it('uses setquota for ext filesystems', async () => {
    const executor = new FakeExecutor();
    await new QuotaBackend(executor).setUserQuota('alice', '/home', 'ext4', LIMITS);

    expect(executor.commands[0]?.argv).toEqual(['setquota', '-u', 'alice', '100M', '200M', '1000', '2000', '/home']);
  });

  it('returns false when the tool exits non-zero', async () => {
    const executor = new FakeExecutor().on(['setquota'], { exitCode: 1, stderr: 'setquota: Mountpoint not found' });
    expect(await new QuotaBackend(executor).setUserQuota('alice', '/home', 'ext3', LIMITS)).toBe(false);
  });

  it('caps the timeout at the configured ceiling', async () => {
    const executor = new FakeExecutor();
    await new QuotaBackend(executor, 2).setUserQuota('alice', '/home', 'xfs', LIMITS);
    expect(executor.timeouts).toEqual([2000]);
  });
});

describe('QuotaBackend.fetchAllQuotas', () => {
  it('issues exactly two xfs_quota reports for xfs', async () => {
    const executor = new FakeExecutor()
      .on(['xfs_quota', '-x', '-c', 'report -h'], { stdout: 'alice 50M 100M 200M 1\nbob 1M 100M 200M 0\n' })
      .on(['xfs_quota', '-x', '-c', 'report -h -i'], { stdout: 'alice 500 1000 2000 0\n' });

    const report = await new QuotaBackend(executor).fetchAllQuotas('/home', 'xfs');

    expect(executor.commands.map((c) => c.argv[3])).toEqual(['report -h', 'report -h -i']);
    expect(report.get('alice')).toMatchObject({ blocksUsed: '50M', inodesHard: '2000' });
    expect(report.get('bob')?.inodesUsed).toBeUndefined();
  });

  it('issues one repquota run for other filesystems', async () => {
    const executor = new FakeExecutor().on(['repquota'], { stdout: 'alice -- 100 102400 204800 10 1000 2000\n' });

    const report = await new QuotaBackend(executor).fetchAllQuotas('/home', 'ext4');

    expect(executor.commands.map((c) => c.argv)).toEqual([['repquota', '-u', '/home']]);
    expect(report.get('alice')?.blocksSoft).toBe('102400');
  });

  it('keeps the blocks report when the inodes report fails', async () => {
    const executor = new FakeExecutor()
      .on(['xfs_quota', '-x', '-c', 'report -h'], { stdout: 'alice 50M 100M 200M 1\n' })
      .on(['xfs_quota', '-x', '-c', 'report -h -i'], { exitCode: 1, stderr: 'xfs_quota: cannot open' });

    const report = await new QuotaBackend(executor).fetchAllQuotas('/home', 'xfs');
    expect(report.get('alice')?.blocksHard).toBe('200M');
    expect(report.get('alice')?.inodesUsed).toBeUndefined();
  });
});

describe('QuotaBackend.fetchUserQuota', () => {
  it('agrees with the batch rendering for xfs', async () => {
    const executor = new FakeExecutor()
      .on(['xfs_quota', '-x', '-c', 'report -h'], { stdout: 'alice 50M 100M 200M 1\n' })
      .on(['xfs_quota', '-x', '-c', 'report -h -i'], { stdout: 'alice 500 1000 2000 0\n' });

    expect(await new QuotaBackend(executor).fetchUserQuota('alice', '/home', 'xfs')).toBe(
      'blocks: 50M/100M/200M; inodes: 500/1000/2000',
    );
  });

  it('reads the first data row of quota -u on other filesystems', async () => {
    const executor = new FakeExecutor().on(['quota', '-u', 'alice'], {
      stdout: [
        'Disk quotas for user alice (uid 1001):',
        '     Filesystem  blocks   quota   limit   grace   files   quota   limit   grace',
        '      /dev/sda1     100  102400  204800              10    1000    2000',
        '      /dev/sdb1       7     500     900               1      50      90',
      ].join('\n'),
    });

    expect(await new QuotaBackend(executor).fetchUserQuota('alice', '/home', 'ext4')).toBe(
      'blocks: 100/102400; inodes: 10/1000',
    );
  });

  it('reports "not set" when the tool fails', async () => {
    const executor = new FakeExecutor().on(['quota'], { exitCode: 1 });
    expect(await new QuotaBackend(executor).fetchUserQuota('alice', '/home', 'ext2')).toBe('not set');
  });
});
