import fs from 'fs';
import os from 'os';
import path from 'path';
import { Workspace } from 'loom-core';
import { createServices, type Services } from './services.js';

export interface TestServices {
  services: Services;
  tempDir: string;
  cleanup: () => void;
}

export function steppingClock(start: string, stepMs = 60_000): () => Date {
  let next = Date.parse(start);
  return () => {
    const now = new Date(next);
    next += stepMs;
    return now;
  };
}

/**
 * Services over a fresh workspace. Events are stamped by a clock that starts
 * at `start` and advances one minute per append.
 */
export function createTestServices(prefix: string, start = '2026-03-14T09:00:00.000Z'): TestServices {
  const tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
  const workspace = Workspace.init(path.join(tempDir, '.loom'));
  const services = createServices(
    workspace,
    { author: 'tester', branch: 'main' },
    { clock: steppingClock(start) }
  );
  return {
    services,
    tempDir,
    cleanup: () => fs.rmSync(tempDir, { recursive: true, force: true }),
  };
}
