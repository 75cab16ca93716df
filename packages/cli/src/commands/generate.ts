import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, relative, resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { fromBinary } from '@bufbuild/protobuf';
import { FileDescriptorSetSchema, type FileDescriptorSet } from '@bufbuild/protobuf/wkt';
import {
  ERRORS,
  decodeFiles,
  errorMessage,
  generateFiles,
  loadConfigFile,
  resolveConfig,
  type GeneratedFile,
  type GeneratorConfig,
} from 'cache-manager-codegen';

export interface GenerateOptions {
  out?: string;
  file?: string[];
  target?: string;
  suffix?: string;
  /** Go output layout: import | source_relative */
  paths?: string;
  /** Go import path prefix stripped from output names */
  module?: string;
  dryRun?: boolean;
  /** Directory the config file is searched from */
  config?: string;
  quiet?: boolean;
}

export interface GenerateResult {
  files: GeneratedFile[];
  /** Absolute paths written to disk; empty on a dry run */
  written: string[];
}

/**
 * Generate cache managers from a binary FileDescriptorSet, as produced by
 * `protoc --include_source_info --include_imports --descriptor_set_out`.
 */
export async function generateCommand(
  descriptorSet: string,
  options: GenerateOptions = {},
): Promise<GenerateResult> {
  const setPath = resolve(descriptorSet);
  const log = (line: string) => {
    if (!options.quiet) console.log(line);
  };

  // 1. Read the descriptor set
  if (!existsSync(setPath)) throw ERRORS.FILE_NOT_FOUND(setPath);

  const spinner = ora({ text: 'Reading descriptor set...', isSilent: options.quiet }).start();
  let set: FileDescriptorSet;
  try {
    set = fromBinary(FileDescriptorSetSchema, readFileSync(setPath));
  } catch (err) {
    spinner.fail('Failed to decode descriptor set');
    throw ERRORS.DESCRIPTOR_READ_FAILED(setPath, errorMessage(err));
  }
  spinner.succeed(`Read ${chalk.white(String(set.file.length))} proto file(s)`);

  // 2. Resolve config: defaults ← config file ← flags
  const fileConfig = await loadConfigFile(options.config ?? process.cwd());
  const config = resolveConfig(fileConfig, flagsToConfig(options));

  // 3. Generate
  const toGenerate = options.file && options.file.length > 0 ? options.file : set.file.map(f => f.name);
  const files = generateFiles(decodeFiles(set.file, toGenerate, config.goImportMap), config);

  if (files.length === 0) {
    log(chalk.yellow(`\n⚠ No service ending in "${config.suffix}" found — nothing generated.\n`));
    return { files, written: [] };
  }

  log(chalk.green(`\n✔ ${files.length} cache manager file(s) for target ${chalk.cyan(config.target)}\n`));
  for (const file of files) log(`  ${chalk.white(file.name)}`);

  if (options.dryRun) {
    log(chalk.blue('\nℹ Dry run — no files written.\n'));
    return { files, written: [] };
  }

  // 4. Write output
  const outDir = resolve(options.out ?? '.');
  const written: string[] = [];
  for (const file of files) {
    const outputPath = resolve(outDir, file.name);
    try {
      mkdirSync(dirname(outputPath), { recursive: true });
      writeFileSync(outputPath, file.content, 'utf-8');
    } catch (err) {
      throw ERRORS.WRITE_FAILED(outputPath, errorMessage(err));
    }
    written.push(outputPath);
  }

  log(chalk.green(`\n📄 Written to: ${relative(process.cwd(), outDir) || '.'}\n`));
  return { files, written };
}

// ── Helpers ───────────────────────────────────────────────────

function flagsToConfig(options: GenerateOptions): Partial<GeneratorConfig> {
  const flags: Partial<GeneratorConfig> = {};
  if (options.target !== undefined) {
    if (options.target !== 'go' && options.target !== 'ts') throw ERRORS.UNKNOWN_TARGET(options.target);
    flags.target = options.target;
  }
  if (options.suffix !== undefined) flags.suffix = options.suffix;
  if (options.paths !== undefined) {
    if (options.paths !== 'import' && options.paths !== 'source_relative') {
      throw ERRORS.INVALID_PARAMETER(`paths=${options.paths}`, 'expected import or source_relative');
    }
    flags.goPaths = options.paths;
  }
  if (options.module !== undefined) flags.goModule = options.module;
  return flags;
}
