import chalk from "chalk";
import type { Logger } from "pino";

import { resultRows } from "../cassandra/result-rows.js";
import type { LabSession } from "../cassandra/session.js";
import { CheckFailedError, ExerciseIncompleteError } from "./errors.js";
import { renderTable } from "./table-renderer.js";
import type { ExerciseContext } from "./types.js";

export interface ExerciseKitOptions {
  session: LabSession;
  logger: Logger;
  /** Receives every block of text an exercise prints, without trailing newline. */
  print: (text: string) => void;
}

export function createExerciseContext({ session, logger, print }: ExerciseKitOptions): ExerciseContext {
  return {
    session,
    logger,
    comment(text) {
      print(chalk.gray(`> ${text}`));
    },
    check(condition, label) {
      if (!condition) {
        print(`${chalk.red("✗")} ${label}`);
        throw new CheckFailedError(label);
      }
      print(`${chalk.green("✓")} ${label}`);
    },
    display(result) {
      print(renderTable(resultRows(result)));
    },
    displayRows(rows) {
      print(renderTable(rows));
    },
    todo(hint) {
      throw new ExerciseIncompleteError(hint);
    },
  };
}
