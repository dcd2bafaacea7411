import { clamp, isFiniteNumber } from './utils';

export interface PuppetRuntimeOptions {
  /** Gravity acceleration in puppet units per second squared, pointing down (+y). */
  gravity: number;
  /** Longest physics integration step, in seconds. Longer frames are subdivided. */
  maxPhysicsStep: number;
  /** Upper bound on sub-steps per tick; frame time beyond it is dropped. */
  maxPhysicsSubsteps: number;
  /** State magnitudes below this snap to rest when nothing pulls the node. 0 disables. */
  physicsRestEpsilon: number;
  physicsEnabled: boolean;
}

export const DEFAULT_PUPPET_RUNTIME_OPTIONS: PuppetRuntimeOptions = {
  gravity: 9.8,
  maxPhysicsStep: 1 / 120,
  maxPhysicsSubsteps: 32,
  physicsRestEpsilon: 1e-9,
  physicsEnabled: true,
};

const normalizeNumber = (value: unknown, fallback: number, min: number, max: number): number => (
  isFiniteNumber(value) ? clamp(value, min, max) : fallback
);

const normalizeBoolean = (value: unknown, fallback: boolean): boolean => (
  typeof value === 'boolean' ? value : fallback
);

export const normalizePuppetRuntimeOptions = (
  value?: Partial<PuppetRuntimeOptions> | null
): PuppetRuntimeOptions => {
  const source = value ?? {};
  return {
    gravity: normalizeNumber(source.gravity, DEFAULT_PUPPET_RUNTIME_OPTIONS.gravity, -1e6, 1e6),
    maxPhysicsStep: normalizeNumber(
      source.maxPhysicsStep,
      DEFAULT_PUPPET_RUNTIME_OPTIONS.maxPhysicsStep,
      1e-5,
      1
    ),
    maxPhysicsSubsteps: Math.round(normalizeNumber(
      source.maxPhysicsSubsteps,
      DEFAULT_PUPPET_RUNTIME_OPTIONS.maxPhysicsSubsteps,
      1,
      4096
    )),
    physicsRestEpsilon: normalizeNumber(
      source.physicsRestEpsilon,
      DEFAULT_PUPPET_RUNTIME_OPTIONS.physicsRestEpsilon,
      0,
      1
    ),
    physicsEnabled: normalizeBoolean(source.physicsEnabled, DEFAULT_PUPPET_RUNTIME_OPTIONS.physicsEnabled),
  };
};
