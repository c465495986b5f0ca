import { Command } from 'commander';
import { formatLocation, type ValidationResult } from 'loom-core';
import { ExitCode, handleError } from '../errors.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

const ICONS = { error: '✗', warning: '⚠', conflict: '⇄' } as const;

export function runValidate(options: { services: Services; strict?: boolean; json: boolean }): ValidationResult {
  const { services, strict = false, json } = options;
  const result = services.validationService.validate({ strict });

  if (json) {
    console.log(JSON.stringify(result));
    return result;
  }

  for (const diagnostic of result.diagnostics) {
    const location = formatLocation(diagnostic);
    const prefix = location ? `${location} ` : '';
    console.log(`  ${ICONS[diagnostic.severity]} ${prefix}[${diagnostic.kind}] ${diagnostic.message}`);
  }
  const summary = `${result.files} file(s), ${result.events} event(s): ${result.errors} error(s), ${result.warnings} warning(s), ${result.conflicts} conflict(s)`;
  console.log(result.valid ? `✓ ${summary}` : `✗ ${summary}`);
  return result;
}

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check every active and archived log for structural problems')
    .option('--strict', 'Fail on warnings too')
    .action(function (this: Command, opts: { strict?: boolean }) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const result = runValidate({
          services: openFromGlobals(globalOpts),
          strict: opts.strict ?? false,
          json: globalOpts.json,
        });
        if (!result.valid) {
          process.exitCode = ExitCode.ValidationError;
        }
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
