/**
 * Policy evaluator: expected free energy scoring and action selection.
 *
 * For every candidate action the evaluator predicts the next cell and scores
 * it as
 *
 *   G(a) = −( log(b[goal] + ε) + KL(oneHot(next(a)) ‖ b) )
 *
 * where `b` is the current belief. The first (instrumental) term is read from
 * the belief as it stands before the move and is therefore the same for every
 * action; only the epistemic term separates candidates. Lower `G` is better.
 * Cells outside the grid or believed to be obstacles score `+Infinity`.
 *
 * Ties are resolved deterministically: the candidate closer to the goal
 * (Manhattan distance) wins, then the earlier action in `ACTIONS` order. The
 * same rule settles ties between `+Infinity` scores, so a boxed-in agent
 * still commits to an action instead of halting.
 */
import { onceWarn } from '../utils/warnings';
import type { BeliefStore } from './agent.belief';
import { BELIEF_EPSILON } from './agent.constants';
import { isInside } from './agent.options';
import {
  ACTIONS,
  type Action,
  type ActionScore,
  type PolicyDecision,
  type Position,
  type RandomSource,
} from './agent.types';

/** Row/column displacement applied by each action. */
const DISPLACEMENTS: Readonly<Record<Action, Position>> = Object.freeze({
  up: [-1, 0],
  down: [1, 0],
  left: [0, -1],
  right: [0, 1],
});

/** Dependencies the evaluator reads; it never writes to any of them. */
export interface PolicyContext {
  belief: BeliefStore;
  goal: Position;
  admissibilityThreshold: number;
  rng: RandomSource;
}

export class PolicyEvaluator {
  readonly #context: PolicyContext;

  constructor(context: PolicyContext) {
    this.#context = context;
  }

  /**
   * Apply the displacement of `action` to `position`. Pure; no bounds check.
   *
   * @example PolicyEvaluator.predictNextPosition([2, 3], 'up') // -> [1, 3]
   */
  static predictNextPosition(position: Position, action: Action): Position {
    const [dRow, dCol] = DISPLACEMENTS[action];
    return [position[0] + dRow, position[1] + dCol];
  }

  /** Manhattan distance between two cells. */
  static manhattan(a: Position, b: Position): number {
    return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
  }

  /**
   * `actions` filtered into canonical `ACTIONS` order, duplicates dropped.
   *
   * @throws {Error} If no known action remains.
   */
  static canonicalOrder(actions: readonly Action[]): Action[] {
    const ordered = ACTIONS.filter((action) => actions.includes(action));
    if (!ordered.length) throw new Error('At least one action is required.');
    return ordered;
  }

  /** Instrumental value `log(b[goal] + ε)` under the current belief. */
  instrumentalValue(): number {
    const { belief, goal } = this.#context;
    return Math.log(belief.get(goal) + BELIEF_EPSILON);
  }

  /** Full evaluation of `action` taken from `position`. */
  evaluate(position: Position, action: Action): ActionScore {
    const { belief, admissibilityThreshold } = this.#context;
    const candidate = PolicyEvaluator.predictNextPosition(position, action);
    const instrumental = this.instrumentalValue();
    const admissible =
      isInside(candidate, belief.rows, belief.cols) &&
      belief.get(candidate) >= admissibilityThreshold;
    if (!admissible) {
      return {
        action,
        candidate,
        score: Infinity,
        instrumental,
        epistemic: NaN,
        admissible,
      };
    }
    const epistemic = belief.divergenceFromCertainty(candidate);
    const raw = -(instrumental + epistemic);
    return {
      action,
      candidate,
      score: Number.isNaN(raw) ? Infinity : raw,
      instrumental,
      epistemic,
      admissible,
    };
  }

  /** Expected free energy of `action` taken from `position`. */
  score(position: Position, action: Action): number {
    return this.evaluate(position, action).score;
  }

  /** Evaluate every action in canonical order. */
  scoreAll(position: Position, actions: readonly Action[] = ACTIONS): ActionScore[] {
    return PolicyEvaluator.canonicalOrder(actions).map((action) =>
      this.evaluate(position, action)
    );
  }

  /**
   * Pick the minimum-score entry using the goal-distance / action-order
   * tie-break.
   */
  static selectMinimum(scores: readonly ActionScore[], goal: Position): ActionScore {
    if (!scores.length) throw new Error('Cannot select from an empty score list.');
    let best = scores[0];
    for (let i = 1; i < scores.length; i++) {
      const entry = scores[i];
      if (entry.score < best.score) {
        best = entry;
      } else if (
        entry.score === best.score &&
        PolicyEvaluator.manhattan(entry.candidate, goal) <
          PolicyEvaluator.manhattan(best.candidate, goal)
      ) {
        best = entry;
      }
    }
    return best;
  }

  /**
   * Choose the action to commit from `position`.
   *
   * With probability `explorationRate` a uniformly random action is returned
   * without scoring; otherwise every action is scored and the minimum wins.
   * A rate of 0 never consumes the random source.
   */
  chooseAction(
    position: Position,
    actions: readonly Action[] = ACTIONS,
    explorationRate: number = 0
  ): PolicyDecision {
    const ordered = PolicyEvaluator.canonicalOrder(actions);
    const { rng, goal } = this.#context;
    if (explorationRate > 0 && rng() < explorationRate) {
      const pick = Math.min(ordered.length - 1, Math.floor(rng() * ordered.length));
      return { action: ordered[pick], explored: true, scores: [] };
    }
    const scores = ordered.map((action) => this.evaluate(position, action));
    const best = PolicyEvaluator.selectMinimum(scores, goal);
    if (best.score === Infinity) {
      onceWarn(
        'policy.boxed-in',
        'Every action is inadmissible under the current belief; committing the tie-break choice.'
      );
    }
    return { action: best.action, explored: false, scores };
  }
}
