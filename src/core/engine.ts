import path from 'node:path';
import os from 'node:os';
import type { Logger } from 'pino';

import type { LabSession } from '../cassandra/session.js';
import { createLogger } from './logger.js';
import { JsonFileProgressStore } from './state.js';
import { ExerciseIncompleteError } from './errors.js';
import { createExerciseContext } from './exercise-kit.js';
import type { Exercise, ExerciseResult, ExerciseStatus, ProgressStore } from './types.js';

export interface EngineOptions {
  session: LabSession;
  verbose?: boolean;
  prettyLogs?: boolean;
  stateFilePath?: string;
  logger?: Logger;
  progress?: ProgressStore;
  hooks?: EngineHooks;
}

export interface EngineHooks {
  onStatusChange?: (payload: { id: string; status: ExerciseStatus }) => void;
  onOutput?: (payload: { id: string; text: string }) => void;
}

/**
 * Orders exercises so that dependencies come first; ties are broken by `order`, then id.
 */
export function orderExercises(exercises: readonly Exercise[]): Exercise[] {
  const idToExercise = new Map(exercises.map((e) => [e.id, e]));
  const tempMark = new Set<string>();
  const permMark = new Set<string>();
  const result: Exercise[] = [];

  const visit = (exercise: Exercise): void => {
    if (permMark.has(exercise.id)) return;
    if (tempMark.has(exercise.id)) {
      throw new Error(`Circular dependency detected at ${exercise.id}`);
    }
    tempMark.add(exercise.id);
    for (const depId of exercise.dependsOn ?? []) {
      const dep = idToExercise.get(depId);
      if (!dep) throw new Error(`Missing dependency ${depId} for ${exercise.id}`);
      visit(dep);
    }
    permMark.add(exercise.id);
    tempMark.delete(exercise.id);
    result.push(exercise);
  };

  exercises
    .slice()
    .sort((a, b) => (a.order ?? 100) - (b.order ?? 100) || a.id.localeCompare(b.id))
    .forEach(visit);

  return result;
}

export class ExerciseEngine {
  private readonly exercises: Map<string, Exercise> = new Map();
  private readonly session: LabSession;
  private readonly logger: Logger;
  private readonly progress: ProgressStore;
  private readonly hooks?: EngineHooks;

  constructor(options: EngineOptions) {
    this.session = options.session;
    this.logger =
      options.logger ??
      createLogger({ pretty: options.prettyLogs ?? true, verbose: options.verbose ?? false });
    this.progress =
      options.progress ??
      new JsonFileProgressStore(
        options.stateFilePath ?? path.join(os.homedir(), '.cql-labs', 'state.json'),
      );
    this.hooks = options.hooks;
  }

  register(exercise: Exercise): void {
    if (this.exercises.has(exercise.id)) {
      throw new Error(`Exercise with id ${exercise.id} already registered`);
    }
    this.exercises.set(exercise.id, exercise);
  }

  /**
   * Registered exercises in run order.
   */
  list(): Exercise[] {
    return orderExercises(Array.from(this.exercises.values()));
  }

  async run(selectedIds?: string[]): Promise<Record<string, ExerciseResult>> {
    const ordered = this.list();
    const results: Record<string, ExerciseResult> = {};
    const blockedIds = new Set<string>();

    for (const exercise of ordered) {
      if (selectedIds && !selectedIds.includes(exercise.id)) continue;
      const { id } = exercise;

      // Ignored exercises only run when asked for by id.
      if (exercise.ignored && !selectedIds) {
        this.logger.debug({ exercise: id }, 'Ignored');
        this.finish(id, results, { status: 'ignored', durationMs: 0 });
        continue;
      }
      const blockedBy = (exercise.dependsOn ?? []).find((dep) => blockedIds.has(dep));
      if (blockedBy) {
        blockedIds.add(id);
        this.logger.warn({ exercise: id, dependency: blockedBy }, 'Skipped due to unsuccessful dependency');
        this.finish(id, results, { status: 'skipped', durationMs: 0, message: `depends on ${blockedBy}` });
        continue;
      }

      this.hooks?.onStatusChange?.({ id, status: 'running' });
      const ctx = createExerciseContext({
        session: this.session,
        logger: this.logger.child({ exercise: id }),
        print: (text) => this.hooks?.onOutput?.({ id, text }),
      });
      const startedAt = Date.now();
      try {
        await exercise.run(ctx);
        this.finish(id, results, { status: 'passed', durationMs: Date.now() - startedAt });
      } catch (error) {
        blockedIds.add(id);
        const durationMs = Date.now() - startedAt;
        const message = error instanceof Error ? error.message : String(error);
        if (error instanceof ExerciseIncompleteError) {
          this.logger.info({ exercise: id }, message);
          this.finish(id, results, { status: 'incomplete', durationMs, message });
        } else {
          this.logger.error({ exercise: id, error }, 'Exercise failed');
          this.finish(id, results, { status: 'failed', durationMs, message, error });
        }
      }
    }

    await this.progress.flush();
    return results;
  }

  private finish(id: string, results: Record<string, ExerciseResult>, result: ExerciseResult): void {
    results[id] = result;
    this.progress.record(id, {
      status: result.status,
      at: new Date().toISOString(),
      message: result.message,
    });
    this.hooks?.onStatusChange?.({ id, status: result.status });
  }
}
