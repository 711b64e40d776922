/**
 * Belief Visualization - renders belief heatmaps with a path overlay
 *
 * Each frame is drawn one character per cell. Marker precedence is
 * agent (`A`) > goal (`G`) > obstacle (`#`) > visited cell (`•`) > belief
 * shade. Shades are scaled against the largest belief mass in the frame:
 *
 *   `·` ruled out (mass 0)   `░` ≤ 25%   `▒` ≤ 50%   `▓` ≤ 75%   `█` > 75%
 *
 * Rendering is purely observational: frames are copies taken from the agent
 * and nothing here writes back.
 */
import type { Position } from '../agent/agent.types';
import { formatPosition } from '../agent/agent.options';
import { config } from '../config';
import Divergence from '../methods/divergence';
import { colors } from './colors';

/** Read-only snapshot consumed by the renderers. */
export interface VisualizationFrame {
  /** Committed steps so far. */
  step: number;
  belief: readonly (readonly number[])[];
  history: readonly Position[];
  position: Position;
  goal: Position;
  obstacles: readonly Position[];
}

export interface RenderOptions {
  /** ANSI colors; defaults to `config.colors`. */
  color?: boolean;
}

/** Shade characters from "ruled out" to "highest mass". */
export const SHADES = ['·', '░', '▒', '▓', '█'] as const;

function posKey([row, col]: Position): string {
  return `${row},${col}`;
}

export class BeliefVisualization {
  /**
   * Shade level 0–4 of `value` relative to `max`. Zero mass (or an all-zero
   * frame) is level 0.
   */
  static shadeLevel(value: number, max: number): number {
    if (!(value > 0) || !(max > 0)) return 0;
    return Math.min(4, Math.max(1, Math.ceil((value / max) * 4)));
  }

  /** Render the belief grid with markers and path overlay. */
  static renderHeatmap(frame: VisualizationFrame, options: RenderOptions = {}): string {
    const color = options.color ?? config.colors;
    const obstacleKeys = new Set(frame.obstacles.map(posKey));
    const visitedKeys = new Set(frame.history.map(posKey));
    let max = 0;
    for (const row of frame.belief) for (const value of row) max = Math.max(max, value);

    const paint = (code: string, glyph: string, background: string = colors.bgBlack) =>
      color ? `${background}${code}${glyph}${colors.reset}` : glyph;

    return frame.belief
      .map((cells, row) =>
        cells
          .map((value, col) => {
            if (row === frame.position[0] && col === frame.position[1]) {
              return paint(colors.orangeNeon, 'A');
            }
            if (row === frame.goal[0] && col === frame.goal[1]) {
              return paint(colors.neonGreen, 'G');
            }
            const key = `${row},${col}`;
            if (obstacleKeys.has(key)) return paint(colors.blueNeon, '#');
            if (visitedKeys.has(key)) return paint(colors.orangeNeon, '•', colors.floorBg);
            const level = BeliefVisualization.shadeLevel(value, max);
            return paint(colors.gradient[level], SHADES[level]);
          })
          .join('')
      )
      .join('\n');
  }

  /**
   * One-line summary: step, position, goal, belief at the goal and belief
   * entropy (both to 4 decimals).
   *
   * @example 'step 1 | position (0,1) | goal (0,1) | belief@goal 1.0000 | entropy 0.0000'
   */
  static formatStatus(frame: VisualizationFrame): string {
    const flat = frame.belief.flatMap((row) => [...row]);
    const atGoal = frame.belief[frame.goal[0]]?.[frame.goal[1]] ?? 0;
    const entropy = Math.abs(Divergence.entropy(flat));
    return [
      `step ${frame.step}`,
      `position ${formatPosition(frame.position)}`,
      `goal ${formatPosition(frame.goal)}`,
      `belief@goal ${atGoal.toFixed(4)}`,
      `entropy ${entropy.toFixed(4)}`,
    ].join(' | ');
  }

  /** Heatmap followed by the status line. */
  static renderFrame(frame: VisualizationFrame, options: RenderOptions = {}): string {
    return `${BeliefVisualization.renderHeatmap(frame, options)}\n${BeliefVisualization.formatStatus(frame)}`;
  }
}
