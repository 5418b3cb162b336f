/**
 * Unit tests for RemediationGovernor
 */

import { RemediationGovernor } from '../../src/tasks/iocmng/remediation-governor';

const MINUTE = 60_000;

describe('RemediationGovernor', () => {
  let restart: jest.Mock<Promise<void>, []>;

  beforeEach(() => {
    restart = jest.fn<Promise<void>, []>(async () => undefined);
  });

  it('restarts at most once within the cooldown window', async () => {
    const governor = new RemediationGovernor({ threshold: 5, cooldownMs: 10 * MINUTE }, restart);
    const start = 1_700_000_000_000;

    expect(await governor.observe({ connected: 2, disconnected: 8 }, start)).toBe(true);
    expect(await governor.observe({ connected: 2, disconnected: 8 }, start + MINUTE)).toBe(false);

    expect(restart).toHaveBeenCalledTimes(1);
    expect(governor.getLastRestart()).toBe(start);
  });

  it('restarts again once the cooldown has elapsed', async () => {
    const governor = new RemediationGovernor({ threshold: 5, cooldownMs: 10 * MINUTE }, restart);

    await governor.observe({ connected: 2, disconnected: 8 }, 0);
    await governor.observe({ connected: 2, disconnected: 8 }, 10 * MINUTE);

    expect(restart).toHaveBeenCalledTimes(2);
    expect(governor.getLastRestart()).toBe(10 * MINUTE);
  });

  it.each([
    [5, 8],
    [2, 5],
    [6, 8],
    [2, 4],
  ])('uses strict comparisons (connected=%p, disconnected=%p)', async (connected, disconnected) => {
    const governor = new RemediationGovernor({ threshold: 5, cooldownMs: MINUTE }, restart);

    expect(await governor.observe({ connected, disconnected }, 0)).toBe(false);
    expect(restart).not.toHaveBeenCalled();
  });

  it('never acts without a threshold', async () => {
    const governor = new RemediationGovernor({ threshold: null, cooldownMs: MINUTE }, restart);

    expect(governor.isEnabled()).toBe(false);
    expect(await governor.observe({ connected: 0, disconnected: 100 }, 0)).toBe(false);
    expect(restart).not.toHaveBeenCalled();
  });

  it('never acts without a cooldown', async () => {
    const governor = new RemediationGovernor({ threshold: 5, cooldownMs: null }, restart);

    expect(governor.isEnabled()).toBe(false);
    expect(await governor.observe({ connected: 0, disconnected: 100 }, 0)).toBe(false);
    expect(restart).not.toHaveBeenCalled();
  });
});
