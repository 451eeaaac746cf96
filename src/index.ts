#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { checkCommand } from './commands/check.js';
import { example } from './commands/example.js';
import { VERSION } from './version.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('dpcheck')
    .description('Check Data Package descriptors against the standard and your own rules')
    .version(VERSION);

  program
    .command('check <path>')
    .description('Check a datapackage.json file, or the one in a directory')
    .option('--strict', 'Also check the recommendations (name, id, licenses, lowercase names)')
    .option('--standard <version>', 'Data Package standard version (v1 or v2)')
    .option('--exclude <pattern...>', 'Drop issues at paths matching a pattern')
    .option('--exclude-required <pattern...>', 'Drop missing-property issues at matching paths')
    .option('--exclude-type <type...>', 'Drop issues of a type (e.g. format, primary-key)')
    .option('--config <file>', 'JSON5 configuration file')
    .option('--explain', 'Print an explanation under each issue')
    .option('--quiet', 'Suppress output, exit code only')
    .option('--json', 'Output results as JSON')
    .action(async (path, options) => {
      try {
        const result = await checkCommand(path, options);
        process.exit(result.valid ? 0 : 1);
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(1);
      }
    });

  program
    .command('example')
    .description('Print an example descriptor that passes strict checking')
    .option('--output <file>', 'Write to a file instead of stdout')
    .action(async (options) => {
      try {
        await example(options);
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(1);
      }
    });

  return program;
}

// Only parse when run as CLI entry point (ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // Missing or virtual argv path: not a direct run
}
if (isDirectRun) {
  buildProgram().parse();
}
