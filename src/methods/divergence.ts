/**
 * Information-theoretic measures over discrete probability vectors.
 *
 * The agent scores candidate moves with a relative entropy between a
 * hypothetical "certain" posterior and its current belief, and reports the
 * belief entropy in telemetry. Both quantities take logarithms of values that
 * can legitimately be zero (ruled-out cells), so every log here is taken of
 * `value + epsilon` instead of `value`.
 *
 * @see {@link https://en.wikipedia.org/wiki/Kullback%E2%80%93Leibler_divergence}
 */
import { BELIEF_EPSILON } from '../agent/agent.constants';

/** Read-only numeric vector accepted by the measures below. */
export type ProbabilityVector = ArrayLike<number>;

export default class Divergence {
  /**
   * Natural log of `value + epsilon`, with negative inputs clamped to zero first.
   *
   * @example Divergence.safeLog(0) // -> Math.log(1e-8)
   */
  static safeLog(value: number, epsilon: number = BELIEF_EPSILON): number {
    return Math.log(Math.max(0, value) + epsilon);
  }

  /**
   * A vector of `length` zeros with a single 1 at `index`.
   *
   * @throws {RangeError} If `index` is outside `[0, length)`.
   */
  static oneHot(length: number, index: number): Float64Array {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RangeError(`One-hot index ${index} outside [0, ${length}).`);
    }
    const vector = new Float64Array(length);
    vector[index] = 1;
    return vector;
  }

  /**
   * Relative entropy `KL(p ‖ q) = Σ p_i · (log(p_i + ε) − log(q_i + ε))`.
   *
   * Terms where `p_i` is zero contribute nothing (the `0 · log 0 = 0`
   * convention), so a one-hot `p` reduces to `log(1 + ε) − log(q_c + ε)`.
   *
   * @throws {Error} If the vectors have different lengths.
   */
  static klDivergence(
    p: ProbabilityVector,
    q: ProbabilityVector,
    epsilon: number = BELIEF_EPSILON
  ): number {
    if (p.length !== q.length) {
      throw new Error('Probability vectors must have the same length.');
    }
    let divergence = 0;
    for (let i = 0; i < p.length; i++) {
      const pi = p[i];
      if (!(pi > 0)) continue;
      divergence +=
        pi * (Divergence.safeLog(pi, epsilon) - Divergence.safeLog(q[i], epsilon));
    }
    return divergence;
  }

  /**
   * Shannon entropy `−Σ p_i · log(p_i + ε)` in nats. Zero entries are skipped.
   */
  static entropy(p: ProbabilityVector, epsilon: number = BELIEF_EPSILON): number {
    let total = 0;
    for (let i = 0; i < p.length; i++) {
      const pi = p[i];
      if (pi > 0) total -= pi * Divergence.safeLog(pi, epsilon);
    }
    return total;
  }

  /** Sum of all entries. */
  static sum(values: ProbabilityVector): number {
    let total = 0;
    for (let i = 0; i < values.length; i++) total += values[i];
    return total;
  }
}
