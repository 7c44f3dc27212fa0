import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { parseLogLevel, type CeilingSpec, type LogLevel, type PolicyConfig } from "@pipeline-dispatch/core";

// Dispatcher configuration
export interface DispatcherConfig {
  policyPath: string;
  // executor profile name; falls back to the policy file's "executor"
  executor?: string;
  maxConcurrentTasks: number;
  stopOnFatal: boolean;
  tracePath?: string;
  logDir: string;
  logName: string;
  // simulated resource kills per task in the dry run
  dryRunResourceKills: number;
  logLevel: LogLevel;
  ceilingOverrides: CeilingSpec;
}

const DEFAULT_POLICY_PATH = fileURLToPath(new URL("../config/pipeline-policy.json", import.meta.url));
const DEFAULT_ENV_PATH = fileURLToPath(new URL("../../../.env", import.meta.url));
const DEFAULT_LOG_DIR = fileURLToPath(new URL("../../../raw-logs", import.meta.url));
const DEFAULT_MAX_CONCURRENT_TASKS = 4;
const DEFAULT_DRY_RUN_RESOURCE_KILLS = 1;

export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): void {
  dotenv.config({ path: env.DOTENV_CONFIG_PATH ?? DEFAULT_ENV_PATH });
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "n", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadDispatcherConfig(env: NodeJS.ProcessEnv = process.env): DispatcherConfig {
  const ceilingOverrides: CeilingSpec = {};
  const maxCpus = nonEmpty(env.PIPELINE_MAX_CPUS);
  const maxMemory = nonEmpty(env.PIPELINE_MAX_MEMORY);
  const maxTime = nonEmpty(env.PIPELINE_MAX_TIME);
  // kept raw: a malformed override is reported by the ceiling table, not here
  if (maxCpus) {
    ceilingOverrides.cpus = maxCpus;
  }
  if (maxMemory) {
    ceilingOverrides.memory = maxMemory;
  }
  if (maxTime) {
    ceilingOverrides.time = maxTime;
  }

  return {
    policyPath: nonEmpty(env.PIPELINE_POLICY_PATH) ?? DEFAULT_POLICY_PATH,
    executor: nonEmpty(env.PIPELINE_EXECUTOR),
    maxConcurrentTasks: parsePositiveInt(env.MAX_CONCURRENT_TASKS, DEFAULT_MAX_CONCURRENT_TASKS),
    stopOnFatal: parseBoolean(env.STOP_ON_FATAL, true),
    tracePath: nonEmpty(env.PIPELINE_TRACE_PATH),
    logDir: nonEmpty(env.PIPELINE_LOG_DIR) ?? DEFAULT_LOG_DIR,
    logName: nonEmpty(env.PIPELINE_LOG_NAME) ?? "dispatcher",
    dryRunResourceKills: parseNonNegativeInt(
      env.PIPELINE_DRY_RUN_KILLS,
      DEFAULT_DRY_RUN_RESOURCE_KILLS,
    ),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    ceilingOverrides,
  };
}

export function applyCeilingOverrides(config: PolicyConfig, overrides: CeilingSpec): PolicyConfig {
  return {
    ...config,
    ceilings: { ...config.ceilings, ...overrides },
  };
}
