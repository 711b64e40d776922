/**
 * ANSI color codes for belief heatmaps in the terminal.
 *
 * All codes are 256-color escape sequences so the heatmap gradient stays
 * legible on dark terminal themes.
 */
export const colors = {
  // Basic formatting
  reset: '\x1b[0m', // Reset all attributes

  // Markers
  orangeNeon: '\x1b[38;5;208m', // agent
  neonGreen: '\x1b[38;5;46m', // goal
  blueNeon: '\x1b[38;5;45m', // obstacle
  neonRed: '\x1b[38;5;196m', // failure status
  cyanNeon: '\x1b[38;5;87m', // success status

  // Belief gradient (low → high mass)
  gradient: [
    '\x1b[38;5;236m', // ruled out
    '\x1b[38;5;24m',
    '\x1b[38;5;31m',
    '\x1b[38;5;39m',
    '\x1b[38;5;159m', // near certainty
  ],

  // Backgrounds
  bgBlack: '\x1b[48;5;16m', // Pure black background
  floorBg: '\x1b[48;5;234m', // Almost black for visited floor
} as const;
