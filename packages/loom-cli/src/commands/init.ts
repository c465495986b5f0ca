import path from 'path';
import { Command } from 'commander';
import { LOOM_DIR_NAME, Workspace } from 'loom-core';
import { handleError } from '../errors.js';
import { GlobalOptionsSchema } from '../types.js';

export interface InitResult {
  root: string;
  events_dir: string;
  archive_dir: string;
}

export function runInit(options: { root: string; json: boolean }): InitResult {
  const workspace = Workspace.init(options.root);
  const result: InitResult = {
    root: workspace.root,
    events_dir: workspace.eventsDir,
    archive_dir: workspace.archiveDir,
  };

  if (options.json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ Initialized loom workspace at ${result.root}`);
  }
  return result;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description(`Create a ${LOOM_DIR_NAME}/ workspace in a directory (default: current directory)`)
    .argument('[dir]', 'Directory to create the workspace in')
    .action(function (this: Command, dir: string | undefined) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const root = globalOpts.root
          ? path.resolve(globalOpts.root)
          : path.join(path.resolve(dir ?? '.'), LOOM_DIR_NAME);
        runInit({ root, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
