import chalk from "chalk";
import type { ExerciseStatus } from "../core/types.js";

const BADGE_WIDTH = 12;

const badgeColors: Record<ExerciseStatus, chalk.Chalk> = {
  pending: chalk.bgGray.black,
  running: chalk.bgYellow.black,
  passed: chalk.bgGreen.black,
  failed: chalk.bgRed.black,
  incomplete: chalk.bgMagenta.black,
  skipped: chalk.bgCyan.black,
  ignored: chalk.bgWhite.black,
};

/**
 * Formats an exercise status as a fixed-width colored badge, similar to Jest's PASS/FAIL labels.
 */
export function formatStatus(status: ExerciseStatus): string {
  return badgeColors[status](` ${status.toUpperCase()} `.padEnd(BADGE_WIDTH));
}

/**
 * Formats an exercise id followed by its title.
 */
export function formatExercise(id: string, title: string): string {
  return `${chalk.cyan(id)} ${chalk.white(title)}`;
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms} ms` : `${(ms / 1000).toFixed(1)} s`;
}
