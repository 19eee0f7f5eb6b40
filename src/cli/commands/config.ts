/**
 * pyve --config: show resolved tool settings.
 */

import { getGlobalSettingsPath } from '../../core/paths.js';
import { describeSettings } from '../../core/settings.js';
import type { CliRuntime } from '../runtime.js';

function formatValue(value: unknown): string {
  if (value === null) return '(unset)';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export async function configAction(runtime: CliRuntime, options: { json?: boolean }): Promise<void> {
  const { env } = runtime.services;
  const rows = await describeSettings(env);

  if (options.json) {
    runtime.writeJson({ settingsFile: getGlobalSettingsPath(env), settings: rows });
    return;
  }

  const width = Math.max(...rows.map((r) => r.key.length));
  runtime.write(`Settings file: ${getGlobalSettingsPath(env)}`);
  runtime.write('');
  for (const row of rows) {
    runtime.write(`${row.key.padEnd(width)}  ${formatValue(row.value)}  (${row.source})`);
  }
}
