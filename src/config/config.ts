/**
 * Runtime configuration, read from environment variables.
 * The CLI loads `.env` through dotenv before calling `loadConfig`, and its flags
 * override what is read here.
 */

export interface VoxkeyConfig {
  xdotoolPath: string;
  /** Delay between characters typed by xdotool. */
  typeDelayMs: number;
  directiveTimeoutMs: number;
  /** Pause between key combinations of one shortcut (e.g. `ctrl+a` then `Delete`). */
  keySettleMs: number;
  queueCapacity: number;
  focusCountdownSeconds: number;
  /** Committed transcripts below this confidence never reach the engine. */
  minConfidence: number;
  sttUrl?: string;
  debug: boolean;
}

export const DEFAULT_CONFIG: VoxkeyConfig = {
  xdotoolPath: 'xdotool',
  typeDelayMs: 12,
  directiveTimeoutMs: 5000,
  keySettleMs: 100,
  queueCapacity: 32,
  focusCountdownSeconds: 10,
  minConfidence: 0.3,
  debug: false,
};

export class ConfigError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

type Env = Record<string, string | undefined>;

interface NumberCheck {
  min?: number;
  max?: number;
  integer?: boolean;
}

function readNumber(
  env: Env,
  variable: string,
  fallback: number,
  check: NumberCheck = {}
): number {
  const raw = env[variable]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(variable, `expected a number, got "${raw}"`);
  }
  return checkNumber(variable, value, check);
}

/**
 * Validates a numeric setting. Also used by the CLI for flag values.
 */
export function checkNumber(
  variable: string,
  value: number,
  { min = 0, max, integer = false }: NumberCheck = {}
): number {
  if (!Number.isFinite(value)) {
    throw new ConfigError(variable, `expected a number, got ${value}`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new ConfigError(variable, `expected an integer, got ${value}`);
  }
  if (value < min) {
    throw new ConfigError(variable, `must be at least ${min}, got ${value}`);
  }
  if (max !== undefined && value > max) {
    throw new ConfigError(variable, `must be at most ${max}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, variable: string, fallback: boolean): boolean {
  const raw = env[variable]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  throw new ConfigError(variable, `expected true or false, got "${raw}"`);
}

export function loadConfig(env: Env = process.env): VoxkeyConfig {
  const sttUrl = env.VOXKEY_STT_URL?.trim();

  return {
    xdotoolPath: env.VOXKEY_XDOTOOL_PATH?.trim() || DEFAULT_CONFIG.xdotoolPath,
    typeDelayMs: readNumber(env, 'VOXKEY_TYPE_DELAY_MS', DEFAULT_CONFIG.typeDelayMs, { integer: true }),
    directiveTimeoutMs: readNumber(env, 'VOXKEY_DIRECTIVE_TIMEOUT_MS', DEFAULT_CONFIG.directiveTimeoutMs, {
      min: 1,
    }),
    keySettleMs: readNumber(env, 'VOXKEY_KEY_SETTLE_MS', DEFAULT_CONFIG.keySettleMs),
    queueCapacity: readNumber(env, 'VOXKEY_QUEUE_CAPACITY', DEFAULT_CONFIG.queueCapacity, {
      min: 1,
      integer: true,
    }),
    focusCountdownSeconds: readNumber(
      env,
      'VOXKEY_FOCUS_COUNTDOWN',
      DEFAULT_CONFIG.focusCountdownSeconds,
      { integer: true }
    ),
    minConfidence: readNumber(env, 'VOXKEY_MIN_CONFIDENCE', DEFAULT_CONFIG.minConfidence, {
      max: 1,
    }),
    sttUrl: sttUrl || undefined,
    debug: readBoolean(env, 'VOXKEY_DEBUG', DEFAULT_CONFIG.debug),
  };
}
