import React, { useEffect, useState } from 'react';
import { Box, Static, Text, useApp } from 'ink';
import Spinner from 'ink-spinner';
import chalk from 'chalk';

import type { LabConfig } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import type { Exercise, ExerciseResult, ExerciseStatus } from '../core/types.js';
import { formatDuration, formatExercise, formatStatus } from './status-format.js';
import { hasFailures, runExercises } from './run.js';

export interface AppProps {
  config: LabConfig;
  exercises: Exercise[];
  ids?: string[];
}

export default function App({ config, exercises, ids }: AppProps) {
  const { exit } = useApp();
  const [lines, setLines] = useState<string[]>([]);
  const [current, setCurrent] = useState<string | null>(null);
  const [done, setDone] = useState(false);

  useEffect(() => {
    const titles = new Map(exercises.map((e) => [e.id, e.title]));
    const logger = createLogger({ verbose: config.verbose });
    const append = (line: string) => setLines((l) => [...l, line]);

    const onStatusChange = ({ id, status }: { id: string; status: ExerciseStatus }) => {
      if (status === 'running') {
        setCurrent(id);
        append(chalk.bold(`\n${formatExercise(id, titles.get(id) ?? id)}`));
      } else {
        setCurrent(null);
        append(`${formatStatus(status)} ${chalk.gray(id)}`);
      }
    };

    async function run() {
      let results: Record<string, ExerciseResult> = {};
      try {
        results = await runExercises({
          config,
          logger,
          exercises,
          ids,
          hooks: { onStatusChange, onOutput: ({ text }) => append(text) },
        });
        const total = Object.values(results).reduce((sum, r) => sum + r.durationMs, 0);
        append(`\n${Object.keys(results).length} exercises in ${formatDuration(total)}`);
        if (hasFailures(results)) process.exitCode = 1;
      } catch (error) {
        append(chalk.red(`Cannot run exercises: ${error instanceof Error ? error.message : String(error)}`));
        process.exitCode = 1;
      } finally {
        setDone(true);
      }
    }
    void run();
  }, [config, exercises, ids]);

  useEffect(() => {
    if (done) exit();
  }, [done, exit]);

  return (
    <Box flexDirection="column">
      <Static items={lines}>{(line, idx) => <Text key={idx}>{line}</Text>}</Static>
      {!done && (
        <Text color="yellow">
          <Spinner type="dots" /> {current ? `Running ${current}...` : 'Connecting...'}
        </Text>
      )}
    </Box>
  );
}
