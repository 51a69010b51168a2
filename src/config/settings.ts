import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';

import { SettingsSchema } from './schema';
import type { Settings } from './types';

export class SettingsError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SettingsError';
  }
}

let cachedSettings: Settings | null = null;

export function defaultSettingsPath(): string {
  return resolve(process.cwd(), 'configs', 'settings.yaml');
}

export function parseSettings(text: string): Settings {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new SettingsError('Settings file is not valid YAML', [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new SettingsError('Invalid settings', issues);
  }
  return result.data;
}

export function loadSettings(configPath?: string): Settings {
  if (!configPath && cachedSettings) {
    return cachedSettings;
  }

  const fileContents = readFileSync(configPath ?? defaultSettingsPath(), 'utf-8');
  const parsed = parseSettings(fileContents);

  if (!configPath) {
    cachedSettings = parsed;
  }
  return parsed;
}
