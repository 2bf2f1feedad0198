#!/usr/bin/env node
/**
 * elfdeps - CLI Interface
 *
 * Lists the shared libraries an ELF64 executable or shared object needs at runtime.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { collectDependencies } from './dependencies.js';
import { isStaticOutcome } from './elf-binary.js';
import { formatReport } from './report.js';

interface CliOptions {
  readonly json?: boolean;
  readonly details?: boolean;
}

const program = new Command();

const version = '0.1.0';

program
  .name('elfdeps')
  .description('List the DT_NEEDED shared libraries of a 64-bit little-endian ELF binary')
  .version(version)
  .argument('<file>', 'Path to the executable or shared object')
  .option('--json', 'Print the full report as JSON')
  .option('--details', 'Also print SONAME, RPATH, RUNPATH, file size and SHA256')
  .action(async (file: string, options: CliOptions) => {
    try {
      const report = await collectDependencies(resolve(file));
      const lines: string[] = formatReport(report, {
        format: options.json ? 'json' : 'text',
        details: options.details ?? false,
      });
      for (const line of lines) {
        console.log(line);
      }
    } catch (error) {
      const message: string = error instanceof Error ? error.message : String(error);
      if (isStaticOutcome(error)) {
        console.error(`ℹ️  No dynamic dependencies: ${message}`);
      } else {
        console.error('❌ Dependency listing failed:', message);
      }
      process.exit(1);
    }
  });

await program.parseAsync();
