#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import chalk from 'chalk';

import { resolveConfig } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { JsonFileProgressStore } from '../core/state.js';
import { allExercises } from '../exercises/index.js';
import App from './App.js';
import { formatExercise, formatStatus } from './status-format.js';
import { hasFailures, printExercises, printProgress, runExercises } from './run.js';

const argv = yargs(hideBin(process.argv))
  .scriptName('cql-labs')
  .usage('$0 <cmd> [args]')
  .command('run [ids..]', 'Run exercises against the cluster', (y) =>
    y.positional('ids', { type: 'string', array: true, describe: 'Exercise ids to run' })
  )
  .command('list', 'List exercises in run order', (y) => y)
  .command('progress', 'Show the last outcome of each exercise', (y) => y)
  .option('verbose', { type: 'boolean', default: false })
  .option('plain', { type: 'boolean', default: false, describe: 'Write output without the interactive view' })
  .option('contact-point', { type: 'string', array: true, describe: 'host:port of a node' })
  .option('datacenter', { type: 'string', describe: 'Local data center name' })
  .option('state-file', { type: 'string', describe: 'Where progress is stored' })
  .demandCommand(1)
  .strict()
  .help()
  .parseSync();

const [command] = argv._;
const ids = Array.isArray(argv.ids) ? argv.ids.filter((id): id is string => typeof id === 'string') : [];
const config = resolveConfig({
  contactPoints: argv['contact-point'],
  localDataCenter: argv.datacenter,
  stateFilePath: argv['state-file'],
  verbose: argv.verbose || undefined,
});

async function runPlain(): Promise<void> {
  const logger = createLogger({ verbose: config.verbose });
  const titles = new Map(allExercises.map((e) => [e.id, e.title]));
  const write = (text: string) => process.stdout.write(text + '\n');
  const results = await runExercises({
    config,
    logger,
    exercises: allExercises,
    ids: ids.length > 0 ? ids : undefined,
    hooks: {
      onStatusChange: ({ id, status }) =>
        write(status === 'running' ? `\n${formatExercise(id, titles.get(id) ?? id)}` : `${formatStatus(status)} ${id}`),
      onOutput: ({ text }) => write(text),
    },
  });
  if (hasFailures(results)) process.exitCode = 1;
}

if (command === 'list') {
  printExercises(allExercises);
} else if (command === 'progress') {
  printProgress(new JsonFileProgressStore(config.stateFilePath));
} else if (command === 'run' && argv.plain) {
  runPlain().catch((error: unknown) => {
    process.stderr.write(chalk.red(`${error instanceof Error ? error.message : String(error)}\n`));
    process.exitCode = 1;
  });
} else if (command === 'run') {
  render(<App config={config} exercises={allExercises} ids={ids.length > 0 ? ids : undefined} />);
}
