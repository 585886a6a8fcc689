import { describe, expect, it } from 'vitest';

import { SceneLease } from '../../../../src/infrastructure/sprite-export/index.js';

describe('SceneLease', () => {
  it('allows one job per scene at a time', () => {
    const scene = {};
    const lease = SceneLease.acquire(scene, 'job-1');

    expect(SceneLease.holder(scene)).toBe('job-1');
    expect(() => SceneLease.acquire(scene, 'job-2')).toThrowError(
      expect.objectContaining({ failure: { kind: 'JobAlreadyRunning' } }),
    );

    lease.release();
    expect(SceneLease.holder(scene)).toBeUndefined();
    const next = SceneLease.acquire(scene, 'job-2');
    next.release();
  });

  it('leases independent scenes independently', () => {
    const first = SceneLease.acquire({}, 'job-1');
    const second = SceneLease.acquire({}, 'job-2');

    first.release();
    second.release();
    expect(first.jobId).toBe('job-1');
  });

  it('ignores a stale release after the scene changed hands', () => {
    const scene = {};
    const stale = SceneLease.acquire(scene, 'job-1');
    stale.release();
    const current = SceneLease.acquire(scene, 'job-2');

    stale.release();

    expect(SceneLease.holder(scene)).toBe('job-2');
    current.release();
  });
});
