import { describe, it, expect, vi } from 'vitest';
import { RemoteUnauthorizedError } from '../errors.js';
import { ModeArbiter, type ModeProbe } from '../mode-arbiter.js';
import type { RemoteResult } from '../remote-api-client.js';

function createProbe(configured: boolean, result: RemoteResult<void>) {
  const probe = vi.fn<ModeProbe['probe']>(async () => result);
  const remote: ModeProbe = { configured, probe };
  return { remote, probe };
}

const logger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });

describe('ModeArbiter', () => {
  it('is local-only without a remote client', async () => {
    const arbiter = new ModeArbiter(null);
    await expect(arbiter.selectMode(1)).resolves.toEqual({ mode: 'local_only' });
  });

  it('is local-only without probing when no credential is set', async () => {
    const { remote, probe } = createProbe(false, { ok: true, value: undefined });
    const arbiter = new ModeArbiter(remote);

    await expect(arbiter.selectMode(1)).resolves.toEqual({ mode: 'local_only' });
    expect(probe).not.toHaveBeenCalled();
  });

  it('is augmented when the probe succeeds', async () => {
    const { remote } = createProbe(true, { ok: true, value: undefined });
    const arbiter = new ModeArbiter(remote);

    await expect(arbiter.selectMode(1)).resolves.toEqual({ mode: 'augmented' });
  });

  it('downgrades with a warning when the probe fails', async () => {
    const { remote } = createProbe(true, { ok: false, error: new RemoteUnauthorizedError(401) });
    const log = logger();
    const arbiter = new ModeArbiter(remote, log);

    await expect(arbiter.selectMode(1)).resolves.toEqual({
      mode: 'local_only',
      reason: 'remote API rejected credentials (HTTP 401)',
    });
    expect(log.warn).toHaveBeenCalledWith(
      'remote API unavailable, using local-only mode: remote API rejected credentials (HTTP 401)',
      { code: 'REMOTE_UNAUTHORIZED' },
    );
  });

  it('probes once per cycle', async () => {
    const { remote, probe } = createProbe(true, { ok: true, value: undefined });
    const arbiter = new ModeArbiter(remote);

    await Promise.all([arbiter.selectMode(4), arbiter.selectMode(4)]);
    await arbiter.selectMode(4);
    expect(probe).toHaveBeenCalledTimes(1);

    await arbiter.selectMode(5);
    expect(probe).toHaveBeenCalledTimes(2);
  });
});
