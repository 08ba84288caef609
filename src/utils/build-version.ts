/**
 * Build version helper.
 *
 * Format: v1.0.0+20251129.204700, where the semantic part comes from
 * package.json and the suffix is the process start time (YYYYMMDD.HHMMSS).
 * Computed once at startup so it is stable for the lifetime of the server.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

// Sources run from src/utils, the compiled build from dist/src/utils.
const PACKAGE_JSON_CANDIDATES = [
  join(__dirname, '../../package.json'),
  join(__dirname, '../../../package.json')
];

const getPackageVersion = (): string => {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
      if (parsed.success) return parsed.data.version;
    } catch {
      // try the next location
    }
  }
  return '1.0.0';
};

const buildVersion: string = (() => {
  const version = getPackageVersion();

  const now = new Date();
  const dateStr = String(now.getFullYear()) +
    String(now.getMonth() + 1).padStart(2, '0') +
    String(now.getDate()).padStart(2, '0');
  const timeStr = String(now.getHours()).padStart(2, '0') +
    String(now.getMinutes()).padStart(2, '0') +
    String(now.getSeconds()).padStart(2, '0');
  return `v${version}+${dateStr}.${timeStr}`;
})();

export function getBuildVersion(): string {
  return buildVersion;
}
