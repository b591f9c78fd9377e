#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { SeededRng } from '@faultline/adapters';
import { FAULT_KINDS } from '@faultline/domain';
import { FaultInjector, faultKindSchema } from '@faultline/engine';

import { injectCommand } from './commands/inject.js';
import { reportCommand } from './commands/report.js';
import { runCommand } from './commands/run.js';
import { consoleSink, formatCliError } from './output.js';

function randomFor(seed: number | undefined): SeededRng | undefined {
  return seed === undefined ? undefined : new SeededRng(seed);
}

async function guarded(work: () => Promise<unknown>): Promise<void> {
  try {
    await work();
  } catch (err) {
    console.error(`[cli] ${formatCliError(err)}`);
    process.exitCode = 1;
  }
}

const cli = yargs(hideBin(process.argv))
  .scriptName('faultline')
  .usage('$0 <command> [options]')
  .option('seed', {
    describe: 'Integer seed for the fault RNG (default: unseeded)',
    type: 'number',
    global: true,
  })
  .command(
    'inject',
    'Fire a single fault at probability 1',
    (yargsBuilder) =>
      yargsBuilder
        .option('fault', {
          choices: FAULT_KINDS,
          demandOption: true,
          describe: 'Fault kind to inject',
        })
        .option('duration', { type: 'number', default: 500, describe: 'Latency in ms' })
        .option('error-code', { type: 'number', default: 500, describe: 'Error code for error faults' })
        .option('message', { type: 'string', default: 'Injected fault' })
        .option('target', { type: 'string', default: '*' }),
    (args) =>
      guarded(() =>
        injectCommand(
          {
            fault: faultKindSchema.parse(args.fault),
            duration: args.duration,
            errorCode: args['error-code'],
            message: args.message,
            target: args.target,
          },
          { out: consoleSink, injector: new FaultInjector({ random: randomFor(args.seed) }) },
        ),
      ),
  )
  .command(
    'run',
    'Run an experiment definition file (.yaml, .yml or .json)',
    (yargsBuilder) =>
      yargsBuilder
        .option('experiment', { type: 'string', demandOption: true, describe: 'Definition file' })
        .option('json-output', {
          type: 'boolean',
          default: false,
          describe: 'Print the full result as JSON',
        }),
    (args) =>
      guarded(() =>
        runCommand(
          { experiment: args.experiment, jsonOutput: args['json-output'] },
          { out: consoleSink, random: randomFor(args.seed) },
        ),
      ),
  )
  .command(
    'report',
    'Render a result saved with run --json-output',
    (yargsBuilder) =>
      yargsBuilder.option('file', { type: 'string', demandOption: true, describe: 'Result JSON file' }),
    (args) => guarded(() => reportCommand({ file: args.file }, { out: consoleSink })),
  )
  .demandCommand(1)
  .strict()
  .help();

cli.parseAsync().catch((err: unknown) => {
  console.error(`[cli] ${formatCliError(err)}`);
  process.exitCode = 1;
});
