import { promises as fs, readFileSync } from "node:fs";
import path from "node:path";

import type { ProgressEntry, ProgressStore } from "./types.js";

function isProgressEntry(value: unknown): value is ProgressEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    typeof value.status === "string" &&
    "at" in value &&
    typeof value.at === "string"
  );
}

export class JsonFileProgressStore implements ProgressStore {
  private readonly stateFilePath: string;
  private cache: Record<string, ProgressEntry> = {};

  constructor(stateFilePath: string) {
    this.stateFilePath = stateFilePath;
    try {
      const data: unknown = JSON.parse(readFileSync(this.stateFilePath, "utf8"));
      if (typeof data === "object" && data !== null) {
        for (const [id, entry] of Object.entries(data)) {
          if (isProgressEntry(entry)) this.cache[id] = entry;
        }
      }
    } catch {
      this.cache = {};
    }
  }

  get(id: string): ProgressEntry | undefined {
    return Object.prototype.hasOwnProperty.call(this.cache, id) ? this.cache[id] : undefined;
  }

  record(id: string, entry: ProgressEntry): void {
    this.cache[id] = entry;
  }

  entries(): Array<[string, ProgressEntry]> {
    return Object.entries(this.cache);
  }

  async flush(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });
    await fs.writeFile(this.stateFilePath, JSON.stringify(this.cache, null, 2));
  }
}
