import type { Logger } from 'pino';

import { connect as connectToCluster, type LabSession } from '../cassandra/session.js';
import type { LabConfig } from '../core/config.js';
import { ExerciseEngine, orderExercises, type EngineHooks } from '../core/engine.js';
import { recordRows } from '../core/rows.js';
import { JsonFileProgressStore } from '../core/state.js';
import { printTable } from '../core/table-renderer.js';
import type { ColumnDescriptor, Exercise, ExerciseResult, ProgressStore } from '../core/types.js';

export interface RunOptions {
  config: LabConfig;
  logger: Logger;
  exercises: Exercise[];
  ids?: string[];
  hooks?: EngineHooks;
  progress?: ProgressStore;
  connect?: (config: LabConfig, logger: Logger) => Promise<LabSession>;
}

/**
 * Connects, runs the selected exercises in order and always closes the session.
 */
export async function runExercises({
  config,
  logger,
  exercises,
  ids,
  hooks,
  progress,
  connect = connectToCluster,
}: RunOptions): Promise<Record<string, ExerciseResult>> {
  logger.debug({ config }, 'Resolved configuration');
  const session = await connect(config, logger);
  try {
    const engine = new ExerciseEngine({
      session,
      logger,
      hooks,
      progress: progress ?? new JsonFileProgressStore(config.stateFilePath),
    });
    for (const exercise of exercises) engine.register(exercise);
    return await engine.run(ids);
  } finally {
    await session.shutdown();
  }
}

export function hasFailures(results: Record<string, ExerciseResult>): boolean {
  return Object.values(results).some((r) => r.status === 'failed');
}

type Write = (text: string) => void;

const EXERCISE_COLUMNS: readonly ColumnDescriptor[] = [
  { name: 'step', kind: 'numeric' },
  { name: 'id', kind: 'other' },
  { name: 'title', kind: 'other' },
  { name: 'dependsOn', kind: 'other' },
  { name: 'ignored', kind: 'other' },
];

const PROGRESS_COLUMNS: readonly ColumnDescriptor[] = [
  { name: 'id', kind: 'other' },
  { name: 'status', kind: 'other' },
  { name: 'at', kind: 'other' },
  { name: 'message', kind: 'other' },
];

export function printExercises(exercises: Exercise[], write?: Write): void {
  const rows = recordRows(
    orderExercises(exercises).map((e, idx) => ({
      step: idx + 1,
      id: e.id,
      title: e.title,
      dependsOn: (e.dependsOn ?? []).join(', '),
      ignored: e.ignored ?? false,
    })),
  );
  printTable(rows, EXERCISE_COLUMNS, write);
}

export function printProgress(progress: ProgressStore, write?: Write): void {
  const rows = recordRows(
    progress.entries().map(([id, entry]) => ({
      id,
      status: entry.status,
      at: entry.at,
      message: entry.message ?? '',
    })),
  );
  printTable(rows, PROGRESS_COLUMNS, write);
}
