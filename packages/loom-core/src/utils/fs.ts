import fs from 'fs';
import path from 'path';

export function tempPathFor(filePath: string): string {
  return `${filePath}.tmp-${process.pid}`;
}

/**
 * Writes `content` and fsyncs it before returning.
 */
export function writeFileDurable(filePath: string, content: string): void {
  const fd = fs.openSync(filePath, 'w');
  try {
    fs.writeSync(fd, content);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Replaces `filePath` through a sibling temp file and a rename, so readers
 * see either the old content or the new one.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);
  try {
    writeFileDurable(tempPath, content);
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
}
