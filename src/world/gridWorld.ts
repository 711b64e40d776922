/**
 * Grid World - immutable occupancy grid the agent moves through.
 *
 * Cells hold `0` (free) or `1` (obstacle). The grid is fixed at construction;
 * the agent only ever queries it. Cells beyond the edge report `obstacle`, so
 * an attempted move off the grid is observed as a collision.
 */
import type { Dimensions, Observation, Position } from '../agent/agent.types';
import { isInside } from '../agent/agent.options';

/** Serializable world description shared by the parser, CLI and driver. */
export interface WorldDefinition extends Dimensions {
  start: Position;
  goal: Position;
  obstacles: readonly Position[];
}

export class GridWorld {
  readonly rows: number;
  readonly cols: number;
  readonly #cells: Uint8Array;

  /**
   * @throws {RangeError} If the dimensions are not positive integers or an
   *  obstacle lies outside the grid.
   */
  constructor(dimensions: Dimensions, obstacles: readonly Position[] = []) {
    const { rows, cols } = dimensions;
    if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(cols) || cols <= 0) {
      throw new RangeError(`Grid dimensions must be positive integers (got ${rows}x${cols}).`);
    }
    this.rows = rows;
    this.cols = cols;
    this.#cells = new Uint8Array(rows * cols);
    for (const obstacle of obstacles) {
      if (!this.inBounds(obstacle)) {
        throw new RangeError(
          `Obstacle (${obstacle[0]},${obstacle[1]}) outside the ${rows}x${cols} grid.`
        );
      }
      this.#cells[obstacle[0] * cols + obstacle[1]] = 1;
    }
  }

  /** Build a world from a parsed or configured definition. */
  static fromDefinition(definition: WorldDefinition): GridWorld {
    return new GridWorld(definition, definition.obstacles);
  }

  inBounds(position: Position): boolean {
    return isInside(position, this.rows, this.cols);
  }

  /** `free` or `obstacle`; out-of-bounds cells are `obstacle`. */
  occupancy(position: Position): Observation {
    if (!this.inBounds(position)) return 'obstacle';
    return this.#cells[position[0] * this.cols + position[1]] === 1 ? 'obstacle' : 'free';
  }

  /** Obstacle cells in row-major order. */
  obstacles(): Position[] {
    const found: Position[] = [];
    for (let index = 0; index < this.#cells.length; index++) {
      if (this.#cells[index] === 1) {
        found.push([Math.floor(index / this.cols), index % this.cols]);
      }
    }
    return found;
  }

  /** Copy of the occupancy grid as rows of `0 | 1`. */
  toMatrix(): number[][] {
    const matrix: number[][] = [];
    for (let row = 0; row < this.rows; row++) {
      const start = row * this.cols;
      matrix.push(Array.from(this.#cells.subarray(start, start + this.cols)));
    }
    return matrix;
  }
}
