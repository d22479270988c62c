import os from "node:os";
import path from "node:path";

export interface LabConfig {
  contactPoints: string[];
  localDataCenter: string;
  username?: string;
  password?: string;
  stateFilePath: string;
  verbose: boolean;
}

export type LabConfigOverrides = Partial<LabConfig>;

export const DEFAULT_CONTACT_POINTS = ["localhost:9042"];
export const DEFAULT_DATACENTER = "datacenter1";

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolves the lab configuration: explicit overrides first, then CQL_LABS_* environment variables, then defaults.
 */
export function resolveConfig(
  overrides: LabConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): LabConfig {
  const envContactPoints = nonEmpty(env.CQL_LABS_CONTACT_POINTS)
    ?.split(",")
    .map((point) => point.trim())
    .filter(Boolean);

  return {
    contactPoints:
      overrides.contactPoints && overrides.contactPoints.length > 0
        ? overrides.contactPoints
        : envContactPoints && envContactPoints.length > 0
          ? envContactPoints
          : DEFAULT_CONTACT_POINTS,
    localDataCenter:
      nonEmpty(overrides.localDataCenter) ?? nonEmpty(env.CQL_LABS_DATACENTER) ?? DEFAULT_DATACENTER,
    username: nonEmpty(overrides.username) ?? nonEmpty(env.CQL_LABS_USERNAME),
    password: nonEmpty(overrides.password) ?? nonEmpty(env.CQL_LABS_PASSWORD),
    stateFilePath:
      nonEmpty(overrides.stateFilePath) ??
      nonEmpty(env.CQL_LABS_STATE_FILE) ??
      path.join(os.homedir(), ".cql-labs", "state.json"),
    verbose: overrides.verbose ?? env.CQL_LABS_VERBOSE === "1",
  };
}
