#!/usr/bin/env node
import { readFileSync } from 'fs';
import sade from 'sade';
import { runCommand } from './command.js';

type CliOptions = {
  _: string[];
  strict: boolean;
  verbose: boolean;
};

function readPackageInfo() {
  const info = { version: '0.0.0', description: '' };
  const parsed: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8'),
  );
  if (typeof parsed === 'object' && parsed !== null) {
    if ('version' in parsed && typeof parsed.version === 'string') {
      info.version = parsed.version;
    }
    if ('description' in parsed && typeof parsed.description === 'string') {
      info.description = parsed.description;
    }
  }
  return info;
}

// Positionals are optional here so that a wrong count reaches runCommand and prints the usage
function convert(
  input: string | undefined,
  output: string | undefined,
  start: string | undefined,
  size: string | undefined,
  opts: CliOptions,
) {
  const args = [input, output, start, size].filter((arg): arg is string => arg !== undefined);
  const exitCode = runCommand([...args, ...opts._.map(String)], opts);
  if (exitCode) {
    process.exit(exitCode);
  }
}

const packageInfo = readPackageInfo();

sade('hexbank [input] [output] [start] [size]', true)
  .version(packageInfo.version)
  .describe(packageInfo.description)
  .option('-s, --strict', 'Reject records whose checksum byte is missing or wrong', false)
  .option('--verbose', 'Log every record as it is processed', false)
  .example('app.hex app.bin 0x08000000 0xE738')
  .action(convert)
  .parse(process.argv);
