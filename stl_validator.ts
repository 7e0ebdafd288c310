#!/usr/bin/env node
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

import { buildReport, failureReport } from './report';
import type { Report } from './report';
import { validateFile } from './validate';

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function buildParser(args: string[]) {
  return yargs(args)
    .scriptName('stl-validator')
    .usage('Usage: $0 <file> [options]')
    .help(false)
    .version(false)
    .option('verbose', { alias: 'v', type: 'boolean', default: false, describe: 'Print every warning as it is found' })
    .option('tolerant', {
      alias: 't',
      type: 'boolean',
      default: false,
      describe: 'Report negative vertices, winding order and endsolid name mismatches as warnings instead of errors',
    })
    .option('help', { alias: 'h', type: 'boolean', default: false, describe: 'Show help' })
    .env('STL_VALIDATOR')
    .strictOptions()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    });
}

/**
 * Validates the file named by `args` and prints the JSON report: to stdout on
 * pass, to stderr on fail. Resolves to the process exit code.
 */
export async function run(args: string[], io: CliIo = consoleIo): Promise<number> {
  const parser = buildParser(args);
  let argv;
  try {
    argv = parser.parseSync();
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  }
  const [target] = argv._;
  if (argv.help || target === undefined) {
    parser.showHelp((text) => io.stdout(text));
    return 0;
  }

  const file = String(target);
  let report: Report;
  try {
    const outcome = await validateFile(file, {
      strict: !argv.tolerant,
      verbose: argv.verbose,
      log: io.stdout,
    });
    report = buildReport(file, outcome);
  } catch (err) {
    report = failureReport(err instanceof Error ? err.message : String(err));
  }

  if (report.eventOutcomeInformation === 'pass') {
    io.stdout(JSON.stringify(report));
    return 0;
  }
  io.stderr(JSON.stringify(report));
  return 1;
}

if (require.main === module) {
  run(hideBin(process.argv))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
