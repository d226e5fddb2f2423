import { runSteps } from '../../../src/provisioning/steps.js';

type Step = 'first' | 'second' | 'third';
const NONE = { first: 'skipped', second: 'skipped', third: 'skipped' } as const;

describe('runSteps', () => {
  it('runs requested steps in plan order and skips the rest', async () => {
    const order: string[] = [];
    const plan = (['first', 'second', 'third'] as const).map(
      (step) =>
        [
          step,
          async () => {
            order.push(step);
            return true;
          },
        ] as const,
    );

    const report = await runSteps<Step>('alice', plan, ['third', 'first'], NONE);

    expect(order).toEqual(['first', 'third']);
    expect(report).toEqual({
      username: 'alice',
      outcomes: { first: 'succeeded', second: 'skipped', third: 'succeeded' },
      overall: true,
    });
  });

  it('records thrown and false results as failures and keeps going', async () => {
    const third = jest.fn(async () => true);
    const report = await runSteps<Step>(
      'alice',
      [
        ['first', async () => Promise.reject(new Error('ldap down'))],
        ['second', async () => false],
        ['third', third],
      ],
      ['first', 'second', 'third'],
      NONE,
    );

    expect(third).toHaveBeenCalled();
    expect(report.outcomes).toEqual({ first: 'failed', second: 'failed', third: 'succeeded' });
    expect(report.overall).toBe(false);
  });

  it('is vacuously successful with no requested steps', async () => {
    const report = await runSteps<Step>('alice', [['first', async () => false]], [], NONE);
    expect(report.overall).toBe(true);
    expect(report.outcomes.first).toBe('skipped');
  });
});
