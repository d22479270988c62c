import type { Logger } from "pino";
import type { LabSession, QueryResult } from "../cassandra/session.js";

/**
 * Alignment category of a column: numeric values are right-aligned, everything else left-aligned.
 */
export type ValueKind = "numeric" | "other";

/**
 * Identity and alignment policy of one table column.
 */
export interface ColumnDescriptor {
  name: string;
  kind: ValueKind;
}

/**
 * One record of a result set, exposing the text form of its values by column name.
 */
export interface TableRow {
  readonly columns: readonly ColumnDescriptor[];
  /**
   * Natural text form of the value in the given column, or undefined when the row has no such column.
   */
  text(column: string): string | undefined;
}

/**
 * Lifecycle states of an exercise within a run.
 */
export type ExerciseStatus =
  | "pending"
  | "running"
  | "passed"
  | "failed"
  | "incomplete"
  | "skipped"
  | "ignored";

/**
 * Helpers available to an exercise while it runs.
 */
export interface ExerciseContext {
  session: LabSession;
  logger: Logger;
  comment(text: string): void;
  check(condition: boolean, label: string): void;
  display(result: QueryResult): void;
  displayRows(rows: readonly TableRow[]): void;
  todo<T = never>(hint?: string): T;
}

export interface Exercise {
  id: string;
  title: string;
  description?: string;
  dependsOn?: string[];
  order?: number;
  /** Ignored exercises are left out of full runs, e.g. a one-off step the learner has already completed. */
  ignored?: boolean;
  run(ctx: ExerciseContext): Promise<void> | void;
}

export interface ExerciseResult {
  status: ExerciseStatus;
  durationMs: number;
  message?: string;
  error?: unknown;
}

export interface ProgressEntry {
  status: ExerciseStatus;
  at: string;
  message?: string;
}

/**
 * Persistent record of the last outcome of each exercise.
 */
export interface ProgressStore {
  get(id: string): ProgressEntry | undefined;
  record(id: string, entry: ProgressEntry): void;
  entries(): Array<[string, ProgressEntry]>;
  flush(): Promise<void>;
}
