/**
 * Belief store: a normalized probability mass function over grid cells.
 *
 * Storage is a row-major `Float64Array` (`index = row * cols + col`). The
 * store is owned by exactly one agent and is only ever mutated through
 * `update`; every read accessor returns copies.
 */
import Divergence from '../methods/divergence';
import { BELIEF_EPSILON } from './agent.constants';
import { isInside } from './agent.options';
import type { Dimensions, Observation, Position } from './agent.types';

export class BeliefStore {
  readonly rows: number;
  readonly cols: number;
  #belief: Float64Array;

  /**
   * Create the initial belief for a `dimensions` grid with the agent known to
   * start at `start`.
   *
   * @throws {RangeError} If `start` lies outside the grid.
   */
  constructor(dimensions: Dimensions, start: Position) {
    this.rows = dimensions.rows;
    this.cols = dimensions.cols;
    this.#belief = BeliefStore.initialize(dimensions, start);
  }

  /**
   * All-ones distribution with the start cell forced to `1.0`, normalized.
   *
   * Forcing the start cell leaves the prior uniform: certainty about the start
   * is folded in at construction rather than through a Bayesian update.
   */
  static initialize(dimensions: Dimensions, start: Position): Float64Array {
    const { rows, cols } = dimensions;
    if (!isInside(start, rows, cols)) {
      throw new RangeError(
        `Start (${start[0]},${start[1]}) outside the ${rows}x${cols} grid.`
      );
    }
    const distribution = new Float64Array(rows * cols).fill(1);
    distribution[start[0] * cols + start[1]] = 1.0;
    return BeliefStore.normalize(distribution);
  }

  /**
   * Divide every entry by `sum + ε` in place and return the same array.
   * An all-zero input stays all-zero.
   */
  static normalize(
    distribution: Float64Array,
    epsilon: number = BELIEF_EPSILON
  ): Float64Array {
    const denominator = Divergence.sum(distribution) + epsilon;
    for (let i = 0; i < distribution.length; i++) distribution[i] /= denominator;
    return distribution;
  }

  /** Row-major index of `position`; throws for cells outside the grid. */
  indexOf(position: Position): number {
    if (!isInside(position, this.rows, this.cols)) {
      throw new RangeError(
        `Cell (${position[0]},${position[1]}) outside the ${this.rows}x${this.cols} belief grid.`
      );
    }
    return position[0] * this.cols + position[1];
  }

  /**
   * Fold the outcome of an attempted move into the belief.
   *
   * - `obstacle`: mass at `target` is set to exactly 0, then renormalized.
   * - `free`: the belief is multiplied by a one-hot at `target` and
   *   renormalized, so the agent becomes certain of its new cell. When the
   *   target carried no mass the product is empty and the one-hot itself is
   *   normalized instead.
   *
   * @throws {RangeError} If `target` lies outside the grid.
   */
  update(observation: Observation, target: Position): void {
    const index = this.indexOf(target);
    if (observation === 'obstacle') {
      this.#belief[index] = 0;
      BeliefStore.normalize(this.#belief);
      return;
    }
    const collapsed = Divergence.oneHot(this.#belief.length, index);
    collapsed[index] *= this.#belief[index];
    if (!(collapsed[index] > 0)) collapsed[index] = 1;
    this.#belief = BeliefStore.normalize(collapsed);
  }

  /** Belief mass at `position`. */
  get(position: Position): number {
    return this.#belief[this.indexOf(position)];
  }

  /**
   * True when `position` is inside the grid and its mass is at least
   * `threshold`.
   */
  isAccessible(position: Position, threshold: number): boolean {
    if (!isInside(position, this.rows, this.cols)) return false;
    return this.#belief[this.indexOf(position)] >= threshold;
  }

  /** Total mass (≈ 1 unless every cell has been ruled out). */
  sum(): number {
    return Divergence.sum(this.#belief);
  }

  /** Shannon entropy of the belief in nats. */
  entropy(): number {
    return Divergence.entropy(this.#belief);
  }

  /** Relative entropy of a one-hot at `position` against the belief. */
  divergenceFromCertainty(position: Position): number {
    const certain = Divergence.oneHot(this.#belief.length, this.indexOf(position));
    return Divergence.klDivergence(certain, this.#belief);
  }

  /** Copy of the flat row-major distribution. */
  snapshot(): Float64Array {
    return this.#belief.slice();
  }

  /** Copy of the distribution as `rows` arrays of `cols` numbers. */
  toMatrix(): number[][] {
    const matrix: number[][] = [];
    for (let row = 0; row < this.rows; row++) {
      const start = row * this.cols;
      matrix.push(Array.from(this.#belief.subarray(start, start + this.cols)));
    }
    return matrix;
  }
}
