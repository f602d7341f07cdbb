import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';

import type { Settings } from './types';

const REQUIRED_SECTIONS: ReadonlyArray<keyof Settings> = [
  'provider',
  'rate_limit',
  'polling',
  'fetch',
  'cache',
  'analysis',
  'keywords',
  'paths',
  'logging',
  'exporter'
];

let cachedSettings: Settings | null = null;

function defaultSettingsPath(): string {
  return process.env.RANK_SENTINEL_SETTINGS ?? resolve(process.cwd(), 'configs', 'settings.yaml');
}

// RANK_SENTINEL_SETTINGS points at an alternative file.
export function loadSettings(configPath = defaultSettingsPath()): Settings {
  if (cachedSettings) {
    return cachedSettings;
  }

  const fileContents = readFileSync(configPath, 'utf-8');
  const parsed = parse(fileContents) as Settings | null;

  const missing = REQUIRED_SECTIONS.filter((section) => {
    const value: unknown = parsed?.[section];
    return typeof value !== 'object' || value === null;
  });
  if (!parsed || missing.length > 0) {
    throw new Error(`Settings file ${configPath} is missing sections: ${missing.join(', ')}`);
  }

  cachedSettings = parsed;
  return parsed;
}

export function resetSettingsCache(): void {
  cachedSettings = null;
}
