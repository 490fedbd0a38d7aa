#!/usr/bin/env node

import { Command, Option } from 'commander';
import { loadConfig } from '../config.js';
import { describeTypes, runExtract, runFile } from './commands.js';

const program = new Command();

program
  .name('code-outline')
  .description('Extract ordered, nested structural records from source trees')
  .version('0.1.0');

program
  .command('extract <directory>')
  .description('Walk a directory and extract records from every recognized file')
  .option('--ignore <dir...>', 'Extra directory names to skip (added to the defaults)')
  .option('--out <file>', 'Write JSON Lines to a file instead of stdout')
  .addOption(new Option('--format <format>', 'Output format').choices(['jsonl', 'summary']))
  .option('--strict', 'Exit with code 2 when any file failed')
  .action((directory: string, opts: { ignore?: string[]; out?: string; format?: 'jsonl' | 'summary'; strict?: boolean }) => {
    process.exitCode = runExtract(directory, opts, loadConfig());
  });

program
  .command('file <path>')
  .description('Extract one file and print its records as JSON Lines')
  .action((filePath: string) => {
    process.exitCode = runFile(filePath);
  });

program
  .command('types')
  .description('List known extensions, their MIME types and processors')
  .action(() => {
    for (const line of describeTypes()) console.log(line);
  });

program.parseAsync(process.argv).catch((err) => {
  console.error('Command failed:', err);
  process.exit(1);
});
