import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { WorkspaceExistsError } from 'loom-core';
import { runInit } from './init.js';

describe('runInit', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'loom-init-test-')));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates the workspace layout', () => {
    const root = path.join(tempDir, '.loom');
    const result = runInit({ root, json: false });

    expect(result).toEqual({
      root,
      events_dir: path.join(root, 'events'),
      archive_dir: path.join(root, 'archive'),
    });
    expect(fs.existsSync(path.join(root, '.gitignore'))).toBe(true);
    expect(console.log).toHaveBeenCalledWith(`✓ Initialized loom workspace at ${root}`);
  });

  it('refuses to initialize twice', () => {
    const root = path.join(tempDir, '.loom');
    runInit({ root, json: false });
    expect(() => runInit({ root, json: false })).toThrow(WorkspaceExistsError);
  });
});
