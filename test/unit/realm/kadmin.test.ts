import { KadminRealm } from '../../../src/realm/kadmin.js';
import { ConfiguredSecretProvider } from '../../../src/secrets/provider.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { AdminErrorCode } from '../../../src/shared/errors.js';
import type { AdminConfig } from '../../../src/types/config.js';
import { FakeExecutor } from '../support/fake-executor.js';
import { testSecrets } from '../support/fixtures.js';

function realmWith(executor: FakeExecutor, overrides: Partial<AdminConfig['realm']> = {}, effectiveUid = 1000) {
  return new KadminRealm(executor, testSecrets(), { realm: { ...DEFAULT_CONFIG.realm, ...overrides }, effectiveUid });
}

describe('KadminRealm', () => {
  it('creates principals through remote kadmin', async () => {
    const executor = new FakeExecutor();
    await realmWith(executor).createPrincipal('alice', 'secret123');

    expect(executor.commands[0]?.argv).toEqual([
      'kadmin',
      '-p',
      'admin/admin@EXAMPLE.LOCAL',
      '-w',
      'test-secret',
      '-q',
      'addprinc -pw "secret123" alice@EXAMPLE.LOCAL',
    ]);
  });

  it('leaves an existing principal alone', async () => {
    const executor = new FakeExecutor().on(['kadmin'], {
      stderr: 'add_principal: Principal or policy already exists while creating "alice@EXAMPLE.LOCAL".',
    });
    await expect(realmWith(executor).createPrincipal('alice', 'secret123')).resolves.toBeUndefined();
  });

  it('fails on a non-zero exit', async () => {
    const executor = new FakeExecutor().on(['kadmin'], { exitCode: 1, stderr: 'kadmin: Cannot contact any KDC for requested realm' });
    await expect(realmWith(executor).createPrincipal('alice', 'secret123')).rejects.toMatchObject({
      code: AdminErrorCode.SUBSYSTEM_UNAVAILABLE,
    });
  });

  it('fails when kadmin reports a query error with exit code 0', async () => {
    const executor = new FakeExecutor().on(['kadmin'], { stderr: 'add_principal: Insufficient access while creating "alice@EXAMPLE.LOCAL".' });
    await expect(realmWith(executor).createPrincipal('alice', 'secret123')).rejects.toMatchObject({
      code: AdminErrorCode.SUBSYSTEM_UNAVAILABLE,
    });
  });

  it('uses kadmin.local without a password when configured and running as root', async () => {
    const executor = new FakeExecutor().on(['kadmin.local'], { stdout: 'Principal: alice@EXAMPLE.LOCAL\n' });
    const secrets = new ConfiguredSecretProvider({ directory: '', realm: '' });
    const realm = new KadminRealm(executor, secrets, {
      realm: { ...DEFAULT_CONFIG.realm, check_method: 'kadmin.local' },
      effectiveUid: 0,
    });

    expect(await realm.hasPrincipal('alice')).toBe(true);
    expect(executor.commands[0]?.argv).toEqual(['kadmin.local', '-q', 'getprinc alice@EXAMPLE.LOCAL']);
  });

  it('falls back to remote kadmin for kadmin.local when not root', async () => {
    const executor = new FakeExecutor();
    await realmWith(executor, { check_method: 'kadmin.local' }, 1000).hasPrincipal('alice');
    expect(executor.commands[0]?.argv[0]).toBe('kadmin');
  });

  it('deletes with -force and ignores a missing principal', async () => {
    const executor = new FakeExecutor().on(['kadmin'], {
      stderr: 'delete_principal: Principal does not exist while deleting principal "ghost@EXAMPLE.LOCAL"',
    });
    await expect(realmWith(executor).deletePrincipal('ghost')).resolves.toBeUndefined();
    expect(executor.commands[0]?.argv.at(-1)).toBe('delprinc -force ghost@EXAMPLE.LOCAL');
  });

  it('rejects when no admin password is available', async () => {
    const executor = new FakeExecutor();
    const realm = new KadminRealm(executor, new ConfiguredSecretProvider({ directory: '', realm: '' }), {
      realm: DEFAULT_CONFIG.realm,
      effectiveUid: 1000,
    });
    await expect(realm.hasPrincipal('alice')).rejects.toMatchObject({ code: AdminErrorCode.CONFIG_ERROR });
    expect(executor.commands).toHaveLength(0);
  });
});
