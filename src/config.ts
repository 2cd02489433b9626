import { config } from 'dotenv';
import { parseDuration, parsePositiveInt } from './utils.js';

config();

export interface RivetConfig {
  /** Per-request timeout for `run` and `send`, in milliseconds */
  timeout: number;
  /** Per-request timeout for `perf`; longer to tolerate latency under load */
  perfTimeout: number;
  parallel: number;
  ci: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export function loadConfig(env: Environment = process.env): RivetConfig {
  return {
    timeout: parseDuration(env.RIVET_TIMEOUT || '30s'),
    perfTimeout: parseDuration(env.RIVET_PERF_TIMEOUT || '60s'),
    parallel: parsePositiveInt(env.RIVET_PARALLEL || '1', 'RIVET_PARALLEL'),
    ci: env.CI === 'true' || env.RIVET_CI === 'true',
  };
}
