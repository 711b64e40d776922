/**
 * Telemetry records and export helpers.
 *
 * The agent appends one `StepRecord` per committed step. The helpers below
 * serialize those records (and the position history) into JSON Lines and CSV
 * so runs can be inspected with line-based tools or spreadsheets. Nothing in
 * this module is read back by the decision logic.
 */
import type { Action, Observation, Position, StepOutcome } from './agent.types';

/** Flat per-step diagnostic snapshot. */
export interface StepRecord {
  step: number;
  action: Action;
  explored: boolean;
  targetRow: number;
  targetCol: number;
  observation: Observation;
  row: number;
  col: number;
  /** Minimum expected free energy; `null` for exploration steps or when infinite. */
  bestScore: number | null;
  /** Belief mass at the goal after the update. */
  beliefAtGoal: number;
  /** Belief entropy (nats) after the update. */
  entropy: number;
}

/** Column order used by `exportTelemetryCSV`. */
export const TELEMETRY_HEADERS: readonly (keyof StepRecord)[] = [
  'step',
  'action',
  'explored',
  'targetRow',
  'targetCol',
  'observation',
  'row',
  'col',
  'bestScore',
  'beliefAtGoal',
  'entropy',
];

/**
 * Build the record for a committed step from its outcome and the post-update
 * belief measurements.
 */
export function createStepRecord(
  outcome: StepOutcome,
  beliefAtGoal: number,
  entropy: number
): StepRecord {
  return {
    step: outcome.step,
    action: outcome.action,
    explored: outcome.explored,
    targetRow: outcome.target[0],
    targetCol: outcome.target[1],
    observation: outcome.observation,
    row: outcome.position[0],
    col: outcome.position[1],
    bestScore: Number.isFinite(outcome.bestScore) ? outcome.bestScore : null,
    beliefAtGoal,
    entropy,
  };
}

/**
 * Serialize records to JSON Lines: one `JSON.stringify`'d record per line.
 */
export function exportTelemetryJSONL(records: readonly StepRecord[]): string {
  return records.map((record) => JSON.stringify(record)).join('\n');
}

/** Format a single CSV cell; `null` becomes an empty cell. */
function csvCell(value: StepRecord[keyof StepRecord]): string {
  if (value === null) return '';
  return String(value);
}

/**
 * Export up to the last `maxEntries` records as CSV (header row included).
 *
 * @returns CSV text, or an empty string when there are no records.
 */
export function exportTelemetryCSV(
  records: readonly StepRecord[],
  maxEntries = 500
): string {
  const recent = records.slice(-maxEntries);
  if (!recent.length) return '';
  const lines: string[] = [TELEMETRY_HEADERS.join(',')];
  for (const record of recent) {
    lines.push(TELEMETRY_HEADERS.map((key) => csvCell(record[key])).join(','));
  }
  return lines.join('\n');
}

/**
 * Export the position history as `step,row,col` CSV. Step 0 is the initial
 * position.
 */
export function exportHistoryCSV(history: readonly Position[]): string {
  const lines = ['step,row,col'];
  history.forEach(([row, col], step) => lines.push(`${step},${row},${col}`));
  return lines.join('\n');
}
