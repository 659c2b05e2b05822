import { readYaml, writeYaml, fileExists } from '../utils/fs.js';
import { ValidationError } from '../core/task/errors.js';
import { EnforcementMode, MIN_TEST_TIMEOUT_MS, TrellisConfig, type TrellisConfigInput } from './types.js';

/**
 * Load `.trellis/config.yaml` (a missing file means all defaults), validate
 * it, then apply environment overrides.
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<TrellisConfig> {
  const raw = (await fileExists(configPath)) ? await readYaml(configPath) : {};
  const parsed = TrellisConfig.safeParse(raw ?? {});
  if (!parsed.success) throw ValidationError.fromZod(`invalid config ${configPath}`, parsed.error);
  return applyEnvOverrides(parsed.data, env);
}

export function applyEnvOverrides(config: TrellisConfig, env: NodeJS.ProcessEnv = process.env): TrellisConfig {
  const out: TrellisConfig = {
    ...config,
    merge: { ...config.merge },
    custodiet: { ...config.custodiet }
  };

  const timeout = resolveTestTimeoutMs(env, config.merge.testTimeoutMs);
  out.merge.testTimeoutMs = timeout;

  const mode = env.TRELLIS_CUSTODIET_MODE?.trim();
  if (mode) {
    const m = EnforcementMode.safeParse(mode);
    if (!m.success) throw new ValidationError(`TRELLIS_CUSTODIET_MODE must be block or warn, got "${mode}"`);
    out.custodiet.mode = m.data;
  }

  const threshold = env.TRELLIS_CUSTODIET_THRESHOLD?.trim();
  if (threshold) {
    const n = Number(threshold);
    if (!Number.isInteger(n) || n < 1) {
      throw new ValidationError(`TRELLIS_CUSTODIET_THRESHOLD must be a positive integer, got "${threshold}"`);
    }
    out.custodiet.threshold = n;
  }

  return out;
}

/**
 * `TRELLIS_TEST_TIMEOUT_MS` if set and numeric (floored, clamped to the
 * minimum), else `fallback`.
 */
export function resolveTestTimeoutMs(env: NodeJS.ProcessEnv, fallback: number): number {
  const raw = env.TRELLIS_TEST_TIMEOUT_MS;
  if (!raw || !raw.trim()) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;

  const ms = Math.floor(parsed);
  if (ms < MIN_TEST_TIMEOUT_MS) return MIN_TEST_TIMEOUT_MS;
  return ms;
}

export async function writeDefaultConfig(configPath: string, overrides: TrellisConfigInput = {}): Promise<TrellisConfig> {
  const config = TrellisConfig.parse(overrides);
  await writeYaml(configPath, config);
  return config;
}
