/**
 * .gitignore pattern management. Matching is by exact line.
 */

import { join } from 'node:path';
import { atomicWrite, safeReadFile } from '../store/atomic.js';
import { GITIGNORE_FILE_NAME } from './paths.js';

function splitLines(content: string): string[] {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Append patterns not already present. Creates the file when missing.
 * Returns the patterns actually added.
 */
export async function addGitignorePatterns(root: string, patterns: string[]): Promise<string[]> {
  const path = join(root, GITIGNORE_FILE_NAME);
  const content = (await safeReadFile(path)) ?? '';
  const lines = splitLines(content);
  const present = new Set(lines);

  const added: string[] = [];
  for (const pattern of patterns) {
    if (!present.has(pattern)) {
      present.add(pattern);
      added.push(pattern);
    }
  }
  if (added.length === 0 && content !== '') return [];

  await atomicWrite(path, [...lines, ...added].map((l) => `${l}\n`).join(''));
  return added;
}

/**
 * Remove every line equal to one of the patterns.
 * Returns the patterns that were found.
 */
export async function removeGitignorePatterns(root: string, patterns: string[]): Promise<string[]> {
  const path = join(root, GITIGNORE_FILE_NAME);
  const content = await safeReadFile(path);
  if (content === null) return [];

  const targets = new Set(patterns);
  const lines = splitLines(content);
  const kept = lines.filter((l) => !targets.has(l));
  if (kept.length === lines.length) return [];

  const removed = patterns.filter((p) => lines.includes(p));
  await atomicWrite(path, kept.map((l) => `${l}\n`).join(''));
  return removed;
}
