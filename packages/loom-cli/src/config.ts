import fs from 'fs';
import path from 'path';
import os from 'os';
import { execFileSync } from 'child_process';
import { Workspace } from 'loom-core';
import { ConfigFileSchema, type Config } from './types.js';

// XDG Base Directory paths, with native paths on Windows
function getXdgConfigHome(): string {
  if (process.platform === 'win32') {
    return process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
  }
  return process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
}

export function getConfigPath(): string {
  if (process.env.LOOM_CONFIG) return process.env.LOOM_CONFIG;
  return path.join(getXdgConfigHome(), 'loom', 'config.json');
}

function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

export function readConfig(configPath: string = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Config file at ${configPath} is invalid JSON`);
  }
  const result = ConfigFileSchema.safeParse(parsed);
  return result.success ? result.data : {};
}

export type RootSource = 'cli' | 'env' | 'config' | 'discovered';

export interface ResolvedRoot {
  path: string;
  source: RootSource;
}

/**
 * Order: `--root`, then `LOOM_ROOT`, then `rootPath` from the config file,
 * then the nearest `.loom/` above the working directory.
 */
export function resolveRootWithSource(
  cliOption?: string,
  configPath: string = getConfigPath(),
  cwd: string = process.cwd()
): ResolvedRoot {
  if (cliOption) return { path: path.resolve(cwd, expandTilde(cliOption)), source: 'cli' };
  if (process.env.LOOM_ROOT) return { path: path.resolve(cwd, expandTilde(process.env.LOOM_ROOT)), source: 'env' };

  const config = readConfig(configPath);
  if (config.rootPath) return { path: path.resolve(cwd, expandTilde(config.rootPath)), source: 'config' };

  return { path: Workspace.discover(cwd).root, source: 'discovered' };
}

export function resolveRoot(cliOption?: string, configPath: string = getConfigPath()): string {
  return resolveRootWithSource(cliOption, configPath).path;
}

function osUserName(): string | undefined {
  try {
    return os.userInfo().username || undefined;
  } catch {
    // no passwd entry for the current uid
    return undefined;
  }
}

export function resolveAuthor(cliOption?: string, config: Config = readConfig()): string {
  return cliOption || process.env.LOOM_AUTHOR || config.defaultAuthor || osUserName() || 'unknown';
}

export function currentGitBranch(cwd: string = process.cwd()): string | undefined {
  try {
    const branch = execFileSync('git', ['rev-parse', '--abbrev-ref', 'HEAD'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
      timeout: 5000,
    }).trim();
    // detached HEAD
    return branch && branch !== 'HEAD' ? branch : undefined;
  } catch {
    return undefined;
  }
}

export function resolveBranch(cliOption?: string, cwd?: string): string {
  return cliOption || process.env.LOOM_BRANCH || currentGitBranch(cwd) || 'main';
}
