/**
 * Shared types for the active inference agent.
 *
 * Positions are `[row, col]` tuples: row 0 is the top of the grid and `up`
 * decreases the row index.
 */

/** Integer grid coordinate `[row, col]`. */
export type Position = readonly [number, number];

/** Grid dimensions in cells. */
export interface Dimensions {
  rows: number;
  cols: number;
}

/** Fixed, ordered action set. The order doubles as the final tie-break. */
export const ACTIONS = ['up', 'down', 'left', 'right'] as const;

export type Action = (typeof ACTIONS)[number];

/** Outcome of an attempted move as reported by the grid world. */
export type Observation = 'free' | 'obstacle';

/**
 * Lifecycle phase of a single perception–action cycle.
 * `goalReached` is terminal.
 */
export type StepPhase =
  | 'awaitingAction'
  | 'actionChosen'
  | 'moved'
  | 'blocked'
  | 'beliefsUpdated'
  | 'goalReached';

/** Random source returning floats in `[0, 1)`. */
export type RandomSource = () => number;

/**
 * Immutable agent configuration. Every field is supplied (or defaulted) at
 * construction; there is no runtime reconfiguration.
 */
export interface AgentConfig {
  /** Grid height in cells. */
  rows: number;
  /** Grid width in cells. */
  cols: number;
  start: Position;
  goal: Position;
  /** Obstacle coordinates; duplicates are harmless. */
  obstacles: readonly Position[];
  /** Step budget for the driver. `0` terminates before the first choice. */
  maxSteps: number;
  /** Probability in `[0, 1]` of taking a uniformly random action. */
  explorationRate: number;
  /** Seed for the exploration RNG. Ignored when `rng` is supplied. */
  seed?: string | number;
  /** Caller-supplied random source (deterministic tests). */
  rng?: RandomSource;
  /** Belief below which a candidate cell counts as a known obstacle. */
  admissibilityThreshold: number;
  /**
   * Consecutive non-advancing steps after which the driver gives up with
   * status `stalled`. `undefined` disables stall detection.
   */
  stallLimit?: number;
}

/** Per-action evaluation produced by the policy evaluator. */
export interface ActionScore {
  action: Action;
  /** Predicted next position (may lie outside the grid). */
  candidate: Position;
  /** Expected free energy; lower is better, `+Infinity` when inadmissible. */
  score: number;
  /** `log(belief[goal] + ε)` under the current belief. */
  instrumental: number;
  /** `KL(oneHot(candidate) ‖ belief)`; `NaN` when the action is inadmissible. */
  epistemic: number;
  admissible: boolean;
}

/** Result of a single `chooseAction` call. */
export interface PolicyDecision {
  action: Action;
  /** True when the exploration roll picked the action at random. */
  explored: boolean;
  /** Scores in `ACTIONS` order; empty when `explored` is true. */
  scores: ActionScore[];
}

/** Outcome of one committed perception–action cycle. */
export interface StepOutcome {
  /** 1-based index of the committed step. */
  step: number;
  action: Action;
  explored: boolean;
  /** Cell the agent attempted to enter. */
  target: Position;
  observation: Observation;
  /** Committed position after the step. */
  position: Position;
  /** Minimum score seen by the evaluator (`NaN` for exploration steps). */
  bestScore: number;
}
