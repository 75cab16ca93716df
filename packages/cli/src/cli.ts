#!/usr/bin/env -S node --import tsx

import { program } from 'commander';
import chalk from 'chalk';
import { formatError, isCacheManagerGenError, errorMessage } from 'cache-manager-codegen';
import { generateCommand, type GenerateOptions } from './commands/generate.js';
import { initCommand } from './commands/init.js';
import { PLUGIN_VERSION } from './protoc-plugin.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function reportAndExit(err: unknown): void {
  if (isCacheManagerGenError(err)) {
    console.error(chalk.red(formatError(err)));
  } else {
    console.error(chalk.red(`\n✖ ${errorMessage(err)}`));
  }
  process.exitCode = 1;
}

program
  .name('cache-manager')
  .description('Generate cache manager wrappers for protobuf services')
  .version(PLUGIN_VERSION);

program
  .command('generate')
  .description('Generate cache managers from a binary FileDescriptorSet')
  .argument('<descriptor-set>', 'Path to the descriptor set (protoc --descriptor_set_out)')
  .option('-o, --out <dir>', 'Output directory', '.')
  .option('-f, --file <proto>', 'Proto file to generate for (repeatable, default: all)', collect, [])
  .option('-t, --target <target>', 'Target language: go | ts')
  .option('-s, --suffix <suffix>', 'Service name suffix that selects services')
  .option('--paths <mode>', 'Go output layout: import | source_relative')
  .option('--module <prefix>', 'Go import path prefix to strip from output names')
  .option('--config <dir>', 'Directory to search for the config file')
  .option('--dry-run', 'List the files that would be generated without writing them')
  .action((descriptorSet: string, options: GenerateOptions) =>
    generateCommand(descriptorSet, options).then(() => undefined, reportAndExit));

program
  .command('init')
  .description('Create a .cachemanagerrc.json in the current directory')
  .option('--force', 'Overwrite an existing .cachemanagerrc.json')
  .action((options: { force?: boolean }) =>
    initCommand(options).then(() => undefined, reportAndExit));

program.parseAsync().catch(reportAndExit);
