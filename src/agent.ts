import { BeliefStore } from './agent/agent.belief';
import {
  formatPosition,
  resolveAgentConfig,
  type AgentConfigInput,
} from './agent/agent.options';
import { PolicyEvaluator } from './agent/agent.policy';
import { createRandomSource } from './agent/agent.rng';
import {
  createStepRecord,
  exportHistoryCSV,
  exportTelemetryCSV,
  exportTelemetryJSONL,
  type StepRecord,
} from './agent/agent.telemetry';
import {
  ACTIONS,
  type Action,
  type ActionScore,
  type AgentConfig,
  type Observation,
  type PolicyDecision,
  type Position,
  type StepOutcome,
  type StepPhase,
} from './agent/agent.types';
import type { GridWorld } from './world/gridWorld';
import { warn } from './utils/warnings';

/**
 * Single active inference agent on a discrete grid.
 *
 * The agent owns its belief store, its committed position and an append-only
 * position history. Each `step` runs one perception–action cycle against a
 * read-only `GridWorld`:
 *
 *   awaitingAction → actionChosen → moved | blocked → beliefsUpdated
 *
 * and `checkGoal` (called by `step` itself and by the driver before every
 * cycle) moves the agent to the terminal `goalReached` phase once the
 * committed position equals the goal.
 *
 * Example:
 * const agent = new ActiveInferenceAgent({ rows: 2, cols: 2, goal: [0, 1], explorationRate: 0 });
 * agent.step(new GridWorld({ rows: 2, cols: 2 }));
 * agent.position; // -> [0, 1]
 */
export default class ActiveInferenceAgent {
  /** Frozen configuration the agent was built with. */
  readonly config: Readonly<AgentConfig>;
  readonly #belief: BeliefStore;
  readonly #policy: PolicyEvaluator;
  #position: Position;
  readonly #history: Position[];
  readonly #telemetry: StepRecord[] = [];
  #phase: StepPhase = 'awaitingAction';
  #steps = 0;

  /**
   * @throws {AgentConfigError} When the merged configuration is invalid.
   */
  constructor(overrides: AgentConfigInput = {}) {
    this.config = resolveAgentConfig(overrides);
    const { rows, cols, start, goal, admissibilityThreshold } = this.config;
    this.#belief = new BeliefStore({ rows, cols }, start);
    this.#policy = new PolicyEvaluator({
      belief: this.#belief,
      goal,
      admissibilityThreshold,
      rng: createRandomSource(this.config),
    });
    this.#position = start;
    this.#history = [start];
  }

  get goal(): Position {
    return this.config.goal;
  }

  /** Current committed position. */
  get position(): Position {
    return this.#position;
  }

  /** Copy of the position history (initial position first). */
  get history(): Position[] {
    return this.#history.slice();
  }

  get phase(): StepPhase {
    return this.#phase;
  }

  /** Number of committed steps so far. */
  get steps(): number {
    return this.#steps;
  }

  /** Copy of the belief distribution as `rows × cols` numbers. */
  beliefMatrix(): number[][] {
    return this.#belief.toMatrix();
  }

  /** Belief mass at `position`. */
  beliefAt(position: Position): number {
    return this.#belief.get(position);
  }

  /** Total belief mass (≈ 1). */
  beliefSum(): number {
    return this.#belief.sum();
  }

  /** Belief entropy in nats. */
  beliefEntropy(): number {
    return this.#belief.entropy();
  }

  isAtGoal(): boolean {
    const [row, col] = this.#position;
    return row === this.config.goal[0] && col === this.config.goal[1];
  }

  /**
   * Start-of-cycle termination check. Enters `goalReached` when the agent
   * stands on the goal, otherwise `awaitingAction`.
   */
  checkGoal(): boolean {
    const reached = this.isAtGoal();
    this.#phase = reached ? 'goalReached' : 'awaitingAction';
    return reached;
  }

  /** Candidate cell for `action` from the current position (pure). */
  predictNextPosition(action: Action): Position {
    return PolicyEvaluator.predictNextPosition(this.#position, action);
  }

  /** Expected free energy of `action` from the current position. */
  score(action: Action): number {
    return this.#policy.score(this.#position, action);
  }

  /** Evaluation of every action in `ACTIONS` order. */
  scoreAll(): ActionScore[] {
    return this.#policy.scoreAll(this.#position);
  }

  /**
   * Pick the next action. Defaults to the full action set and the configured
   * exploration rate. Does not touch the belief or the position.
   */
  chooseAction(
    actions: readonly Action[] = ACTIONS,
    explorationRate: number = this.config.explorationRate
  ): PolicyDecision {
    return this.#policy.chooseAction(this.#position, actions, explorationRate);
  }

  /**
   * Fold an observation about `target` into the belief.
   *
   * @throws {RangeError} If `target` lies outside the grid.
   */
  updateBelief(observation: Observation, target: Position): void {
    this.#belief.update(observation, target);
    if (this.#belief.sum() === 0) {
      warn(`Belief degenerated to all zeros after observing ${target.join(',')}.`);
    }
  }

  /**
   * Run one perception–action cycle against `world`.
   *
   * When `action` is given it is committed as-is (no scoring, no exploration
   * roll); otherwise `chooseAction` decides. A move off the grid is observed
   * as `obstacle` and leaves the belief untouched, since there is no cell to
   * update.
   *
   * @throws {Error} If the agent already stands on the goal or the world's
   *  dimensions differ from the configuration.
   */
  step(world: GridWorld, action?: Action): StepOutcome {
    if (world.rows !== this.config.rows || world.cols !== this.config.cols) {
      throw new Error(
        `World is ${world.rows}x${world.cols} but the agent was configured for ${this.config.rows}x${this.config.cols}.`
      );
    }
    if (this.checkGoal()) {
      throw new Error(`Cannot step: the agent is already at the goal ${formatPosition(this.config.goal)}.`);
    }

    const decision: PolicyDecision =
      action === undefined
        ? this.chooseAction()
        : { action, explored: false, scores: [] };
    this.#phase = 'actionChosen';

    const target = this.predictNextPosition(decision.action);
    const observation = world.occupancy(target);
    if (observation === 'free') {
      this.#position = target;
      this.#phase = 'moved';
    } else {
      this.#phase = 'blocked';
    }
    if (world.inBounds(target)) this.updateBelief(observation, target);
    this.#phase = 'beliefsUpdated';

    this.#steps++;
    this.#history.push(this.#position);
    const outcome: StepOutcome = {
      step: this.#steps,
      action: decision.action,
      explored: decision.explored,
      target,
      observation,
      position: this.#position,
      bestScore: decision.scores.length
        ? Math.min(...decision.scores.map((entry) => entry.score))
        : NaN,
    };
    this.#telemetry.push(
      createStepRecord(
        outcome,
        this.#belief.get(this.config.goal),
        this.#belief.entropy()
      )
    );
    return outcome;
  }

  /** Copy of the per-step telemetry records. */
  telemetry(): StepRecord[] {
    return this.#telemetry.slice();
  }

  exportTelemetryJSONL(): string {
    return exportTelemetryJSONL(this.#telemetry);
  }

  exportTelemetryCSV(maxEntries?: number): string {
    return exportTelemetryCSV(this.#telemetry, maxEntries);
  }

  exportHistoryCSV(): string {
    return exportHistoryCSV(this.#history);
  }
}
