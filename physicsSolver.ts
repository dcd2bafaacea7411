import type { PhysicsDefinition, Vec2 } from './puppetModel';
import type { PuppetRuntimeOptions } from './runtimeOptions';
import { r2d } from './utils';

export interface PendulumState {
  model: 'pendulum';
  node: number;
  definition: PhysicsDefinition;
  /** Radians, relative to the node's authored orientation. */
  angle: number;
  angularVelocity: number;
}

export interface SpringState {
  model: 'spring';
  node: number;
  definition: PhysicsDefinition;
  offset: Vec2;
  velocity: Vec2;
}

export type PhysicsState = PendulumState | SpringState;

export interface PhysicsOutput {
  /** Rotation offset in degrees per pendulum node. */
  rotations: ReadonlyMap<number, number>;
  /** Displacement per spring node, in the node's local space. */
  displacements: ReadonlyMap<number, Vec2>;
}

export interface PhysicsTickResult {
  substeps: number;
  step: number;
  resets: number;
}

/** The frame a physics node hangs from, sampled from the previous pose. */
export interface PhysicsAnchor {
  /** World rotation of the parent in radians; drives pendulums. */
  rotation: number;
  /** World down (0, 1) expressed in the frame a spring offset lives in. */
  down: Vec2;
}

export type AnchorLookup = (state: PhysicsState) => PhysicsAnchor;

const createState = (definition: PhysicsDefinition): PhysicsState => {
  if (definition.model === 'pendulum') {
    return {
      model: 'pendulum',
      node: definition.node,
      definition,
      angle: definition.initialAngle ?? 0,
      angularVelocity: 0,
    };
  }
  return {
    model: 'spring',
    node: definition.node,
    definition,
    offset: { x: definition.initialOffset?.x ?? 0, y: definition.initialOffset?.y ?? 0 },
    velocity: { x: 0, y: 0 },
  };
};

const cloneState = (state: PhysicsState): PhysicsState => (
  state.model === 'pendulum'
    ? { ...state }
    : { ...state, offset: { ...state.offset }, velocity: { ...state.velocity } }
);

const isFiniteState = (state: PhysicsState): boolean => (
  state.model === 'pendulum'
    ? Number.isFinite(state.angle) && Number.isFinite(state.angularVelocity)
    : Number.isFinite(state.offset.x)
      && Number.isFinite(state.offset.y)
      && Number.isFinite(state.velocity.x)
      && Number.isFinite(state.velocity.y)
);

const toRest = (state: PhysicsState): void => {
  if (state.model === 'pendulum') {
    state.angle = 0;
    state.angularVelocity = 0;
    return;
  }
  state.offset = { x: 0, y: 0 };
  state.velocity = { x: 0, y: 0 };
};

/**
 * Splits `dt` into equal sub-steps no longer than `maxStep`. Past
 * `maxSubsteps` the excess time is dropped so a tick stays bounded.
 */
export const planSubsteps = (
  dt: number,
  maxStep: number,
  maxSubsteps: number
): { substeps: number; step: number } => {
  if (!(dt > 0) || !Number.isFinite(dt)) {
    return { substeps: 0, step: 0 };
  }
  const substeps = Math.min(Math.max(1, Math.ceil(dt / maxStep)), maxSubsteps);
  const simulated = Math.min(dt, substeps * maxStep);
  return { substeps, step: simulated / substeps };
};

export class PhysicsSolver {
  private readonly states: PhysicsState[];
  private readonly options: PuppetRuntimeOptions;
  private readonly nameOf: (node: number) => string;
  private published: PhysicsOutput;
  private resetCount = 0;

  constructor(
    definitions: readonly PhysicsDefinition[],
    options: PuppetRuntimeOptions,
    nameOf: (node: number) => string = (node) => `#${node}`
  ) {
    this.states = definitions.map(createState);
    this.options = options;
    this.nameOf = nameOf;
    this.published = this.collectOutput();
  }

  get divergences(): number {
    return this.resetCount;
  }

  /** Copies of the live states, in definition order. */
  snapshot(): PhysicsState[] {
    return this.states.map(cloneState);
  }

  /**
   * Output published by the most recent tick. Deformation reads this before
   * the current frame's tick, which keeps physics one frame behind.
   */
  output(): PhysicsOutput {
    return this.published;
  }

  tick(dt: number, anchorOf: AnchorLookup): PhysicsTickResult {
    const { substeps, step } = planSubsteps(dt, this.options.maxPhysicsStep, this.options.maxPhysicsSubsteps);
    let resets = 0;
    this.states.forEach((state) => {
      const anchor = anchorOf(state);
      for (let index = 0; index < substeps; index += 1) {
        this.integrate(state, anchor, step);
      }
      if (!isFiniteState(state)) {
        toRest(state);
        resets += 1;
        console.warn(`Physics on node "${this.nameOf(state.node)}" diverged; reset to rest.`);
        return;
      }
      this.settle(state, anchor);
    });
    this.resetCount += resets;
    this.published = this.collectOutput();
    return { substeps, step, resets };
  }

  reset(): void {
    this.states.forEach((state, index) => {
      this.states[index] = createState(state.definition);
    });
    this.published = this.collectOutput();
  }

  private integrate(state: PhysicsState, anchor: PhysicsAnchor, h: number): void {
    const { gravityScale, damping, restore, length } = state.definition;
    const gravity = this.options.gravity * gravityScale;
    if (state.model === 'pendulum') {
      const torque = -(gravity / length) * Math.sin(state.angle + anchor.rotation);
      state.angularVelocity += (torque - damping * state.angularVelocity - restore * state.angle) * h;
      state.angle += state.angularVelocity * h;
      return;
    }

    const gx = anchor.down.x * gravity;
    const gy = anchor.down.y * gravity;
    state.velocity.x += (gx - damping * state.velocity.x - restore * state.offset.x) * h;
    state.velocity.y += (gy - damping * state.velocity.y - restore * state.offset.y) * h;
    state.offset.x += state.velocity.x * h;
    state.offset.y += state.velocity.y * h;
  }

  private settle(state: PhysicsState, anchor: PhysicsAnchor): void {
    const epsilon = this.options.physicsRestEpsilon;
    if (epsilon <= 0) {
      return;
    }
    const gravity = this.options.gravity * state.definition.gravityScale;
    if (state.model === 'pendulum') {
      const restPull = Math.abs((gravity / state.definition.length) * Math.sin(anchor.rotation));
      if (
        restPull <= epsilon
        && Math.abs(state.angle) < epsilon
        && Math.abs(state.angularVelocity) < epsilon
      ) {
        toRest(state);
      }
      return;
    }
    if (
      Math.abs(gravity) * Math.hypot(anchor.down.x, anchor.down.y) <= epsilon
      && Math.abs(state.offset.x) < epsilon
      && Math.abs(state.offset.y) < epsilon
      && Math.abs(state.velocity.x) < epsilon
      && Math.abs(state.velocity.y) < epsilon
    ) {
      toRest(state);
    }
  }

  private collectOutput(): PhysicsOutput {
    const rotations = new Map<number, number>();
    const displacements = new Map<number, Vec2>();
    this.states.forEach((state) => {
      if (state.model === 'pendulum') {
        rotations.set(state.node, r2d(state.angle));
      } else {
        displacements.set(state.node, { x: state.offset.x, y: state.offset.y });
      }
    });
    return { rotations, displacements };
  }
}
