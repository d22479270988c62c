import { Client, auth, type ClientOptions } from "cassandra-driver";
import type { Logger } from "pino";

import type { LabConfig } from "../core/config.js";

export interface QueryColumn {
  name: string;
  type: { code: number };
}

export interface QueryRow {
  get(column: string): unknown;
  keys(): string[];
}

/**
 * The part of a driver result set the lab reads.
 */
export interface QueryResult {
  columns: QueryColumn[] | null;
  rows: QueryRow[];
}

export interface ExecuteOptions {
  /** Executes as a prepared statement, binding `?` placeholders from `params` in order. */
  prepare?: boolean;
}

export interface LabSession {
  execute(query: string, params?: unknown[], options?: ExecuteOptions): Promise<QueryResult>;
  shutdown(): Promise<void>;
}

export function buildClientOptions(config: LabConfig): ClientOptions {
  const options: ClientOptions = {
    contactPoints: config.contactPoints,
    localDataCenter: config.localDataCenter,
    encoding: { map: Map, set: Set },
  };
  if (config.username && config.password) {
    options.authProvider = new auth.PlainTextAuthProvider(config.username, config.password);
  }
  return options;
}

class DriverSession implements LabSession {
  constructor(
    private readonly client: Client,
    private readonly logger: Logger,
  ) {}

  async execute(query: string, params?: unknown[], options: ExecuteOptions = {}): Promise<QueryResult> {
    this.logger.debug({ query, params, prepare: options.prepare ?? false }, "Executing CQL");
    return this.client.execute(query, params, { prepare: options.prepare ?? false });
  }

  async shutdown(): Promise<void> {
    await this.client.shutdown();
    this.logger.debug("Session closed");
  }
}

/**
 * Opens a session against the configured cluster.
 */
export async function connect(config: LabConfig, logger: Logger): Promise<LabSession> {
  const client = new Client(buildClientOptions(config));
  logger.info(
    { contactPoints: config.contactPoints, dataCenter: config.localDataCenter },
    "Connecting to Cassandra",
  );
  await client.connect();
  return new DriverSession(client, logger);
}
