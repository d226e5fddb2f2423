import { describeCommand, LocalExecutor, SPAWN_FAILURE_EXIT_CODE } from '../../../src/execution/executor.js';

describe('describeCommand', () => {
  it('masks the value after -w', () => {
    expect(describeCommand({ argv: ['ldapadd', '-x', '-D', 'cn=admin', '-w', 'test-secret'] })).toBe('ldapadd -x -D cn=admin -w ****');
  });

  it('masks passwords inside kadmin queries', () => {
    expect(describeCommand({ argv: ['kadmin.local', '-q', 'addprinc -pw "test-secret" alice@EXAMPLE.LOCAL'] })).toBe(
      'kadmin.local -q addprinc -pw "****" alice@EXAMPLE.LOCAL',
    );
  });
});

describe('LocalExecutor', () => {
  it('reports a missing binary as exit code 127 instead of throwing', async () => {
    const result = await new LocalExecutor().execute({ argv: ['useradmin-test-no-such-binary'] }, 1000);

    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.timedOut).toBe(false);
    expect(result.stderr).toContain('ENOENT');
  });

  it('rejects an empty argv the same way', async () => {
    const result = await new LocalExecutor().execute({ argv: [] }, 1000);
    expect(result).toEqual({ stdout: '', stderr: 'empty command', exitCode: SPAWN_FAILURE_EXIT_CODE, durationMs: 0, timedOut: false });
  });
});
