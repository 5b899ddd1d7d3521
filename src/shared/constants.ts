// shared/constants.ts — Level defaults and presentation constants

export const DEFAULT_GROWTH_RATE = 25;
export const DEFAULT_RAZORS = 0;
export const DEFAULT_WATER = 0;
export const DEFAULT_FLOODING = 0;
export const DEFAULT_WATERPROOF = 10;

export const LEVEL_FILE_EXTENSION = '.map';

export const LOG_PREFIX = '[mine]';

// ANSI SGR sequences used by the renderer
export const SGR = {
  reset: '\x1b[0m',
  blue: '\x1b[34m',
  brightBlue: '\x1b[94m',
  brightRed: '\x1b[91m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  brightGreen: '\x1b[92m',
  magenta: '\x1b[35m',
  brightMagenta: '\x1b[95m',
} as const;
