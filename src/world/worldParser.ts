/**
 * ASCII world layouts.
 *
 * Encoding (one character per cell, one line per row):
 *   '#' = obstacle
 *   '.' or ' ' = free cell
 *   'S' = start (exactly one)
 *   'G' or 'E' = goal (exactly one)
 *
 * Lines that are empty or whitespace-only are skipped, so files may end with
 * a newline. Every remaining row must have the same length.
 *
 * @example
 * parseWorld('S.#\n..G').obstacles // -> [[0, 2]]
 */
import type { Position } from '../agent/agent.types';
import type { WorldDefinition } from './gridWorld';

/** Raised when a layout cannot be turned into a world definition. */
export class WorldParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorldParseError';
  }
}

const OBSTACLE_CHARS = new Set(['#']);
const FREE_CHARS = new Set(['.', ' ']);
const START_CHARS = new Set(['S']);
const GOAL_CHARS = new Set(['G', 'E']);

/**
 * Parse an ASCII layout into a world definition.
 *
 * @throws {WorldParseError} On an empty layout, ragged rows, unknown
 *  characters, or a missing / repeated start or goal marker.
 */
export function parseWorld(layout: string): WorldDefinition {
  const lines = layout
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
  if (!lines.length) throw new WorldParseError('World layout is empty.');

  const cols = lines[0].length;
  let start: Position | undefined;
  let goal: Position | undefined;
  const obstacles: Position[] = [];

  for (let row = 0; row < lines.length; row++) {
    const line = lines[row];
    if (line.length !== cols) {
      throw new WorldParseError(
        `Row ${row} has ${line.length} cells; expected ${cols}.`
      );
    }
    for (let col = 0; col < cols; col++) {
      const cell = line[col];
      if (OBSTACLE_CHARS.has(cell)) {
        obstacles.push([row, col]);
      } else if (START_CHARS.has(cell)) {
        if (start) throw new WorldParseError(`Second start marker at (${row},${col}).`);
        start = [row, col];
      } else if (GOAL_CHARS.has(cell)) {
        if (goal) throw new WorldParseError(`Second goal marker at (${row},${col}).`);
        goal = [row, col];
      } else if (!FREE_CHARS.has(cell)) {
        throw new WorldParseError(`Unknown cell '${cell}' at (${row},${col}).`);
      }
    }
  }

  if (!start) throw new WorldParseError('World layout has no start marker (S).');
  if (!goal) throw new WorldParseError('World layout has no goal marker (G).');
  return { rows: lines.length, cols, start, goal, obstacles };
}

/** Render a definition back to the canonical `S`/`G`/`#`/`.` layout. */
export function formatWorld(definition: WorldDefinition): string {
  const grid: string[][] = [];
  for (let row = 0; row < definition.rows; row++) {
    grid.push(new Array<string>(definition.cols).fill('.'));
  }
  for (const [row, col] of definition.obstacles) grid[row][col] = '#';
  grid[definition.start[0]][definition.start[1]] = 'S';
  grid[definition.goal[0]][definition.goal[1]] = 'G';
  return grid.map((cells) => cells.join('')).join('\n');
}
