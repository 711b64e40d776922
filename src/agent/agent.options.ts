/**
 * Agent configuration defaults, merging and validation.
 *
 * `resolveAgentConfig` is the single entry point used by the agent, the
 * driver and the CLI: it merges caller overrides onto `DEFAULT_AGENT_CONFIG`,
 * validates the result and returns a frozen copy so that no collaborator can
 * reconfigure a running agent.
 */
import { ADMISSIBILITY_THRESHOLD } from './agent.constants';
import type { AgentConfig, Position } from './agent.types';

/**
 * Defaults applied by `resolveAgentConfig`. A 10×10 open grid crossed from
 * the top-left to the bottom-right corner.
 */
export const DEFAULT_AGENT_CONFIG: Readonly<AgentConfig> = Object.freeze({
  rows: 10,
  cols: 10,
  start: [0, 0] as const,
  goal: [9, 9] as const,
  obstacles: [],
  maxSteps: 100,
  explorationRate: 0.1,
  admissibilityThreshold: ADMISSIBILITY_THRESHOLD,
});

/** Caller overrides accepted by `resolveAgentConfig`. */
export type AgentConfigInput = Partial<AgentConfig>;

/**
 * Raised when an agent configuration is rejected. `issues` lists every
 * problem found, in check order.
 */
export class AgentConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid agent configuration: ${issues.join('; ')}`);
    this.name = 'AgentConfigError';
    this.issues = issues;
  }
}

/** Format a position as `(row,col)` for messages and logs. */
export function formatPosition([row, col]: Position): string {
  return `(${row},${col})`;
}

/** True when `position` lies inside a `rows × cols` grid. */
export function isInside(position: Position, rows: number, cols: number): boolean {
  const [row, col] = position;
  return row >= 0 && row < rows && col >= 0 && col < cols;
}

function isIntegerPosition(position: Position): boolean {
  return (
    position.length === 2 &&
    Number.isInteger(position[0]) &&
    Number.isInteger(position[1])
  );
}

/**
 * Collect every problem with `candidate`. An empty array means valid.
 *
 * Checks run in a fixed order: dimensions, start, goal, obstacles, step
 * budget, exploration rate, threshold, stall limit. Position checks are
 * skipped when the dimensions themselves are invalid.
 */
export function collectConfigIssues(candidate: AgentConfig): string[] {
  const issues: string[] = [];
  const { rows, cols } = candidate;
  const dimensionsValid =
    Number.isInteger(rows) && rows > 0 && Number.isInteger(cols) && cols > 0;
  if (!dimensionsValid) {
    issues.push(`grid dimensions must be positive integers (got ${rows}x${cols})`);
  }

  const checkPosition = (label: string, position: Position): boolean => {
    if (!isIntegerPosition(position)) {
      issues.push(`${label} must be an integer [row, col] pair`);
      return false;
    }
    if (dimensionsValid && !isInside(position, rows, cols)) {
      issues.push(
        `${label} ${formatPosition(position)} is outside the ${rows}x${cols} grid`
      );
      return false;
    }
    return true;
  };

  const startValid = checkPosition('start', candidate.start);
  const goalValid = checkPosition('goal', candidate.goal);

  const obstacleKeys = new Set<string>();
  candidate.obstacles.forEach((obstacle, index) => {
    if (checkPosition(`obstacle #${index}`, obstacle)) {
      obstacleKeys.add(`${obstacle[0]},${obstacle[1]}`);
    }
  });
  if (startValid && obstacleKeys.has(`${candidate.start[0]},${candidate.start[1]}`)) {
    issues.push(`start ${formatPosition(candidate.start)} is an obstacle`);
  }
  if (goalValid && obstacleKeys.has(`${candidate.goal[0]},${candidate.goal[1]}`)) {
    issues.push(`goal ${formatPosition(candidate.goal)} is an obstacle`);
  }

  if (!Number.isInteger(candidate.maxSteps) || candidate.maxSteps < 0) {
    issues.push(`maxSteps must be a non-negative integer (got ${candidate.maxSteps})`);
  }
  const rate = candidate.explorationRate;
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    issues.push(`explorationRate must lie in [0, 1] (got ${rate})`);
  }
  const threshold = candidate.admissibilityThreshold;
  if (!Number.isFinite(threshold) || threshold <= 0) {
    issues.push(`admissibilityThreshold must be a positive number (got ${threshold})`);
  }
  if (
    candidate.stallLimit !== undefined &&
    (!Number.isInteger(candidate.stallLimit) || candidate.stallLimit < 1)
  ) {
    issues.push(`stallLimit must be a positive integer (got ${candidate.stallLimit})`);
  }
  return issues;
}

/**
 * Throw `AgentConfigError` when `candidate` has any problem.
 */
export function validateAgentConfig(candidate: AgentConfig): void {
  const issues = collectConfigIssues(candidate);
  if (issues.length) throw new AgentConfigError(issues);
}

/**
 * Merge `overrides` onto the defaults, validate and freeze.
 *
 * @example
 * const cfg = resolveAgentConfig({ rows: 3, cols: 3, goal: [2, 2] });
 */
export function resolveAgentConfig(
  overrides: AgentConfigInput = {}
): Readonly<AgentConfig> {
  const merged: AgentConfig = { ...DEFAULT_AGENT_CONFIG, ...overrides };
  validateAgentConfig(merged);
  const start: Position = [merged.start[0], merged.start[1]];
  const goal: Position = [merged.goal[0], merged.goal[1]];
  const obstacles: readonly Position[] = Object.freeze(
    merged.obstacles.map(([row, col]): Position => [row, col])
  );
  return Object.freeze({ ...merged, start, goal, obstacles });
}
