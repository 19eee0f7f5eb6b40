import { describe, it, expect } from 'vitest';
import { checkRecordedVersion, compareVersions, getPackageVersion } from '../version.js';

describe('compareVersions', () => {
  it('orders by numeric segment, not by string', () => {
    expect(compareVersions('0.8.10', '0.8.9')).toBe('greater');
    expect(compareVersions('0.7.0', '0.8.9')).toBe('less');
  });

  it('treats missing segments as zero', () => {
    expect(compareVersions('1.2', '1.2.0')).toBe('equal');
    expect(compareVersions('1', '1.0.1')).toBe('less');
  });

  it('ignores trailing non-numeric parts of a segment', () => {
    expect(compareVersions('1.2.3rc1', '1.2.3')).toBe('equal');
  });
});

describe('checkRecordedVersion', () => {
  it('classifies an absent version as legacy', () => {
    expect(checkRecordedVersion(undefined, '0.8.9')).toEqual({ kind: 'legacy' });
  });

  it('classifies equal, older and newer versions', () => {
    expect(checkRecordedVersion('0.8.9', '0.8.9')).toEqual({ kind: 'current', recorded: '0.8.9' });
    expect(checkRecordedVersion('0.7.0', '0.8.9')).toEqual({ kind: 'older', recorded: '0.7.0' });
    expect(checkRecordedVersion('1.0.0', '0.8.9')).toEqual({ kind: 'newer', recorded: '1.0.0' });
  });

  it('skips the comparison when asked', () => {
    expect(checkRecordedVersion(undefined, '0.8.9', { skip: true })).toEqual({ kind: 'skipped' });
  });
});

describe('getPackageVersion', () => {
  it('reads the version from package.json', () => {
    expect(getPackageVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
