/**
 * Tool version and recorded-version comparison.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export type VersionComparison = 'equal' | 'less' | 'greater';

/**
 * Compare two dotted numeric versions segment by segment.
 * A missing segment counts as 0, so "1.2" equals "1.2.0". Non-numeric
 * parts of a segment are ignored ("1.2.3rc1" compares as 1.2.3).
 */
export function compareVersions(a: string, b: string): VersionComparison {
  const pa = a.trim().split('.');
  const pb = b.trim().split('.');
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    const na = segmentValue(pa[i]);
    const nb = segmentValue(pb[i]);
    if (na < nb) return 'less';
    if (na > nb) return 'greater';
  }
  return 'equal';
}

function segmentValue(segment: string | undefined): number {
  if (segment === undefined) return 0;
  const match = /^\d+/.exec(segment);
  return match ? Number(match[0]) : 0;
}

/** Relation of a project's recorded version to the running tool. */
export type RecordedVersionStatus =
  | { kind: 'current'; recorded: string }
  | { kind: 'legacy' }
  | { kind: 'older'; recorded: string }
  | { kind: 'newer'; recorded: string }
  | { kind: 'skipped' };

/**
 * Classify a recorded version against the current tool version.
 * An absent recorded version is legacy, always older than current.
 */
export function checkRecordedVersion(
  recorded: string | undefined,
  current: string,
  options?: { skip?: boolean },
): RecordedVersionStatus {
  if (options?.skip) return { kind: 'skipped' };
  if (recorded === undefined) return { kind: 'legacy' };
  switch (compareVersions(recorded, current)) {
    case 'equal': return { kind: 'current', recorded };
    case 'less': return { kind: 'older', recorded };
    case 'greater': return { kind: 'newer', recorded };
  }
}

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    // dist/core/version.js and src/core/version.ts both sit two levels below the root
    const moduleRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
    const pkg: unknown = JSON.parse(readFileSync(join(moduleRoot, 'package.json'), 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
