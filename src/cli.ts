#!/usr/bin/env node
import fs from 'fs-extra';
import { CliOptions, USAGE, UsageError, parseCliArgs } from './args.js';
import { Catalog } from './catalog.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { formatWarning, scanInputs } from './extractor.js';
import { DEFAULT_REGISTRY_PATH, loadRegistry } from './registry.js';

/**
 * Run the extractor; resolves to the process exit code
 */
async function main(args: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = await loadConfig();
  const registry = await loadRegistry(options.registryPath ?? config.registryPath ?? DEFAULT_REGISTRY_PATH);
  const catalog = new Catalog();

  const results = await scanInputs(options.inputs, {
    registry,
    catalog,
    stdinName: options.sourceName,
    onWarning: options.quiet ? undefined : warning => console.warn(formatWarning(warning))
  });

  const output = catalog.serialize();
  if (options.outputPath) {
    await fs.outputFile(options.outputPath, output, 'utf8');
  } else {
    process.stdout.write(output);
  }

  if (!options.quiet) {
    const warnings = results.reduce((sum, r) => sum + r.warnings.length, 0);
    console.warn(`${catalog.size} strings from ${results.length} input(s), ${warnings} warning(s)`);
  }
  return 0;
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 1;
  }
);
