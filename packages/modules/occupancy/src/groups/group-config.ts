import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@hourwise/shared';
import { groupConfigSchema } from '../validation';
import type { GroupConfig } from '../validation';

/** Validates an already-parsed group configuration document. */
export function parseGroupConfig(input: unknown, source = 'group config'): GroupConfig {
  const parsed = groupConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${details}`);
  }
  return parsed.data;
}

/**
 * Reads the group configuration JSON from disk. Files saved by Windows
 * editors may start with a BOM.
 */
export async function loadGroupConfig(path: string): Promise<GroupConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read group config ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ConfigurationError(`Group config ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseGroupConfig(json, `group config ${path}`);
}
