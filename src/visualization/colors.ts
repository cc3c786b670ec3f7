/**
 * ANSI escape sequences for terminal board rendering.
 */
export const colors = {
  reset: '\x1b[0m', // Reset all attributes
  dim: '\x1b[2m', // Dim text
  red: '\x1b[38;5;197m', // Attacked queen
  green: '\x1b[38;5;118m', // Safe queen
};
