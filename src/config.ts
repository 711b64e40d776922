/**
 * Global efe-navigator runtime flags & default instance.
 *
 * WHY THIS EXISTS
 * --------------
 * Library-wide switches (runtime warnings, ANSI coloring) live in one plain object so
 * that tests and the CLI can flip them without threading options through every call.
 * Per-agent settings do NOT live here: they travel in the frozen `AgentConfig` handed to
 * each `ActiveInferenceAgent` constructor.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'efe-navigator';
 *   config.warnings = true; // surface degenerate-belief notices
 *   config.colors = false;  // plain text heatmaps (log files, CI)
 *
 * Adjust BEFORE constructing agents or rendering frames.
 */
export interface NavigatorConfig {
  /**
   * Emit runtime guidance (degenerate belief, boxed-in agent) through `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /**
   * Default for ANSI escape sequences in rendered heatmaps when a renderer call does not
   * specify `color` explicitly.
   * Default: true
   */
  colors: boolean;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: NavigatorConfig = {
  warnings: false, // emit runtime guidance
  colors: true, // ANSI heatmaps by default
};
