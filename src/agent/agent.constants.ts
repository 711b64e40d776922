/**
 * Shared numerical constants for the agent modules.
 *
 * Keeping these in a single dependency‑free module avoids scattering magic
 * numbers across the belief store and the policy evaluator.
 */

/** Additive stabilizer used by normalization and inside every log. */
export const BELIEF_EPSILON = 1e-8;

/** Belief below this value marks a cell as a known obstacle (action inadmissible). */
export const ADMISSIBILITY_THRESHOLD = 1e-6;

/** Tolerance used when asserting that a belief distribution sums to one. */
export const NORMALIZATION_TOLERANCE = 1e-6;

// Add new constants above; keep file import‑free for minimal load overhead.
