/**
 * Environment variable utilities
 * Consistent parsing of boolean and optional values
 */

import { spawnSync } from 'node:child_process';

/**
 * Parse truthy environment variable
 * Accepts: 1, true, yes, on (case-insensitive)
 */
export const isTrue = (v?: string): boolean =>
  /^(1|true|yes|on)$/i.test(String(v || ''));

/**
 * Parse falsy environment variable
 * Accepts: 0, false, no, off (case-insensitive)
 */
export const isFalse = (v?: string): boolean =>
  /^(0|false|no|off)$/i.test(String(v || ''));

/**
 * Get environment variable with default
 */
export const getEnv = (key: string, defaultValue = ''): string =>
  process.env[key] || defaultValue;

/**
 * Get integer environment variable with default
 */
export const getEnvInt = (key: string, defaultValue: number): number => {
  const val = process.env[key];
  if (!val) return defaultValue;
  const parsed = parseInt(val, 10);
  return Number.isFinite(parsed) ? parsed : defaultValue;
};

/**
 * Get comma-separated list environment variable with default
 */
export const getEnvList = (key: string, defaultValue: string[]): string[] => {
  const list = (process.env[key] || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  return list.length ? list : defaultValue;
};

/** Answers whether an executable can be started from this process. */
export type BinaryProbe = (binary: string) => boolean;

const PROBE_CACHE_TTL = 5 * 60 * 1000; // 5 minutes

function spawnProbe(binary: string): boolean {
  try {
    const result = spawnSync(binary, ['--version'], {
      stdio: 'ignore',
      windowsHide: true,
      timeout: 5000,
    });
    return result.status === 0;
  } catch {
    return false;
  }
}

/**
 * Cached `<binary> --version` probe. Results expire so a binary installed
 * while the server runs is picked up without a restart.
 */
export function createBinaryProbe(ttlMs = PROBE_CACHE_TTL, probe: BinaryProbe = spawnProbe): BinaryProbe {
  const cache = new Map<string, { available: boolean; timestamp: number }>();
  return (binary: string) => {
    const now = Date.now();
    const hit = cache.get(binary);
    if (hit && now - hit.timestamp < ttlMs) return hit.available;
    const available = probe(binary);
    cache.set(binary, { available, timestamp: now });
    return available;
  };
}

/**
 * First candidate the probe reports as available, in preference order.
 */
export function findFirstAvailable(candidates: readonly string[], probe: BinaryProbe): string | undefined {
  for (const candidate of candidates) {
    if (!candidate) continue;
    if (probe(candidate)) return candidate;
  }
  return undefined;
}
