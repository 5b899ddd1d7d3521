// cli/config.ts — CliConfig interface + defaults + env var loading

export interface CliConfig {
  levelsDir: string;
  color: boolean;
}

const DEFAULTS = {
  levelsDir: 'levels',
  color: true,
} as const;

function parseFlag(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      throw new Error(`${name} must be a boolean (true/false, 1/0), got "${value}"`);
  }
}

/** CLI overrides beat environment variables, which beat defaults. */
export function loadConfig(
  overrides: Partial<CliConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  let color: boolean = DEFAULTS.color;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') color = false;
  if (env.MINE_SIM_COLOR !== undefined && env.MINE_SIM_COLOR !== '') {
    color = parseFlag('MINE_SIM_COLOR', env.MINE_SIM_COLOR);
  }

  const levelsDir = env.MINE_SIM_LEVELS_DIR || DEFAULTS.levelsDir;

  return {
    levelsDir: overrides.levelsDir ?? levelsDir,
    color: overrides.color ?? color,
  };
}
