import { describe, expect, it } from 'vitest';
import { DEFAULT_PUPPET_RUNTIME_OPTIONS, normalizePuppetRuntimeOptions } from './runtimeOptions';

describe('runtimeOptions', () => {
  it('falls back to defaults when nothing is given', () => {
    expect(normalizePuppetRuntimeOptions()).toEqual(DEFAULT_PUPPET_RUNTIME_OPTIONS);
    expect(normalizePuppetRuntimeOptions(null)).toEqual(DEFAULT_PUPPET_RUNTIME_OPTIONS);
  });

  it('clamps numbers into range and replaces non-finite ones', () => {
    expect(normalizePuppetRuntimeOptions({
      gravity: Number.POSITIVE_INFINITY,
      maxPhysicsStep: 0,
      maxPhysicsSubsteps: 10.6,
      physicsRestEpsilon: -1,
      physicsEnabled: false,
    })).toEqual({
      gravity: 9.8,
      maxPhysicsStep: 1e-5,
      maxPhysicsSubsteps: 11,
      physicsRestEpsilon: 0,
      physicsEnabled: false,
    });
  });
});
