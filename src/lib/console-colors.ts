/**
 * ANSI colors for the dpsync console output
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Colors are off when NO_COLOR is set or stdout is not a terminal
 */
export function shouldUseColors(): boolean {
  if (process.env.NO_COLOR) {
    return false;
  }

  if (typeof process.stdout.isTTY === 'boolean') {
    return process.stdout.isTTY;
  }

  return true;
}

function colorize(text: string, color: string): string {
  return shouldUseColors() ? `${color}${text}${colors.reset}` : text;
}

/**
 * Leveled console output; errors and warnings go to stderr
 */
export const colorConsole = {
  success: (message: unknown, ...args: unknown[]) => {
    console.log(colorize(String(message), colors.green), ...args);
  },

  error: (message: unknown, ...args: unknown[]) => {
    console.error(colorize(String(message), colors.red), ...args);
  },

  warn: (message: unknown, ...args: unknown[]) => {
    console.warn(colorize(String(message), colors.yellow), ...args);
  },

  info: (message: unknown, ...args: unknown[]) => {
    console.log(colorize(String(message), colors.cyan), ...args);
  },

  debug: (message: unknown, ...args: unknown[]) => {
    console.log(colorize(String(message), colors.gray), ...args);
  },
};

/**
 * Colors for per-item and per-category outcomes
 */
export const outcomeColors = {
  succeeded: (text: string) => colorize(text, colors.green),
  failed: (text: string) => colorize(text, colors.red),
  partial: (text: string) => colorize(text, colors.yellow),
  category: (text: string) => colorize(text, colors.bright + colors.magenta),
};
