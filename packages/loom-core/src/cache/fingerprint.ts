import { createHash } from 'crypto';
import fs from 'fs';
import type { LogFile } from '../store/workspace.js';

export interface FileContent {
  name: string;
  content: Buffer;
}

/**
 * Content fingerprint of a set of log files: the name, byte length and
 * SHA-256 of each file, in name order. Mtimes are ignored, so a checkout
 * that rewrites identical files keeps the cache valid.
 */
export function computeFingerprint(files: readonly FileContent[]): string {
  const hash = createHash('sha256');
  const sorted = [...files].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const file of sorted) {
    const digest = createHash('sha256').update(file.content).digest('hex');
    hash.update(`${file.name}\0${file.content.length}\0${digest}\n`);
  }
  return hash.digest('hex');
}

export function fingerprintFiles(files: readonly LogFile[]): string {
  return computeFingerprint(files.map((file) => ({ name: file.name, content: fs.readFileSync(file.path) })));
}
