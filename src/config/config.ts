/**
 * Configuration for the vlog server.
 */

/** Environment variable holding the comma separated target prefixes. */
export const TARGETS_ENV_VAR = 'VLOG';
/** Environment variable enabling debug logging when set to `true`. */
export const DEBUG_ENV_VAR = 'VLOG_DEBUG';

export type Environment = Record<string, string | undefined>;

export interface VLogConfig {
  /** Port to listen on. 0 lets the OS pick a free one. */
  port: number;
  /** Interface to bind the listener to */
  host: string;
  /** Allowed target prefixes. Empty allows every target. */
  targets: readonly string[];
  /** Whether to enable debug logging */
  debug: boolean;
  /** Path the bootstrap page opens its WebSocket on */
  upgradePath: string;
  /**
   * Bytes the viewer may leave unread before it is dropped. Keeps a stalled
   * browser from growing the host's memory.
   */
  maxBufferedBytes: number;
  /** Replaces the bundled bootstrap page */
  page?: string;
}

/**
 * Configuration error with context
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: 'VALIDATION_ERROR',
    public readonly field?: keyof VLogConfig,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Default configuration.
 */
export const defaultConfig: VLogConfig = Object.freeze({
  port: 0,
  host: '127.0.0.1',
  targets: Object.freeze([]),
  debug: false,
  upgradePath: '/vlog',
  maxBufferedBytes: 16 * 1024 * 1024,
});

/**
 * Splits a comma separated list of target prefixes, trimming each piece and
 * dropping the empty ones.
 */
export function parseTargetList(source: string | undefined): string[] {
  if (!source) return [];
  return source
    .split(',')
    .map((target) => target.trim())
    .filter((target) => target.length > 0);
}

/** Sorted and de-duplicated copy of the target list. */
export function normalizeTargets(targets: readonly string[]): readonly string[] {
  const unique = new Set<string>();
  for (const target of targets) {
    if (typeof target !== 'string') {
      throw new ConfigError(`Expected type string for target, got ${typeof target}`, 'VALIDATION_ERROR', 'targets');
    }
    const trimmed = target.trim();
    if (trimmed) unique.add(trimmed);
  }
  return Object.freeze([...unique].sort());
}

// The path is embedded in the page's script, so quotes and the like are out.
const UPGRADE_PATH_PATTERN = /^\/[A-Za-z0-9._~/-]*$/;

function validatePort(port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Port must be an integer between 0 and 65535, got ${port}`, 'VALIDATION_ERROR', 'port');
  }
}

/**
 * Creates a configuration by merging user provided options with defaults.
 * The result is frozen.
 */
export function createConfig(overrides?: Partial<VLogConfig>): VLogConfig {
  const merged: VLogConfig = {
    ...defaultConfig,
    ...overrides,
  };
  validatePort(merged.port);
  if (!Number.isInteger(merged.maxBufferedBytes) || merged.maxBufferedBytes <= 0) {
    throw new ConfigError(
      `maxBufferedBytes must be a positive integer, got ${merged.maxBufferedBytes}`,
      'VALIDATION_ERROR',
      'maxBufferedBytes',
    );
  }
  if (!UPGRADE_PATH_PATTERN.test(merged.upgradePath) || merged.upgradePath === '/') {
    throw new ConfigError(
      `Upgrade path must be an absolute URL path other than '/', got '${merged.upgradePath}'`,
      'VALIDATION_ERROR',
      'upgradePath',
    );
  }
  return Object.freeze({
    ...merged,
    targets: normalizeTargets(merged.targets),
  });
}

/**
 * Configuration used when no builder is involved: an OS assigned port and the
 * target filter taken from `VLOG`.
 */
export function configFromEnvironment(env: Environment = process.env): VLogConfig {
  return createConfig({
    targets: parseTargetList(env[TARGETS_ENV_VAR]),
    debug: env[DEBUG_ENV_VAR] === 'true',
  });
}
