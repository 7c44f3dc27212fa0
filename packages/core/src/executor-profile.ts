import type { ExecutorProfileSpec, ExecutorType } from "./domain/executor-profile";
import type { ResourceBundle } from "./domain/resources";
import { DAY_MS, GIB, MIB, SECOND_MS, formatClockDuration } from "./units";

export interface ExecutorProfile {
  readonly name: string;
  readonly type: ExecutorType;
  // operator-supplied options appended verbatim (clusterOptions)
  readonly extraSubmissionOptions: string;
  // may clamp or round, never drops a kind
  resourceOverlay(resources: ResourceBundle): ResourceBundle;
  submissionOptions(resources: ResourceBundle): string[];
}

export function toMebibytes(bytes: number): number {
  return Math.ceil(bytes / MIB);
}

// "16G" for whole GiB, otherwise rounded up to "NNNNM"
export function formatGridMemory(bytes: number): string {
  if (bytes > 0 && bytes % GIB === 0) {
    return `${bytes / GIB}G`;
  }
  return `${toMebibytes(bytes)}M`;
}

// Slurm accepts "days-hours:minutes:seconds"; rounded up to whole seconds first
export function formatSlurmTime(ms: number): string {
  const rounded = Math.ceil(ms / SECOND_MS) * SECOND_MS;
  if (rounded < DAY_MS) {
    return formatClockDuration(rounded);
  }
  const days = Math.floor(rounded / DAY_MS);
  return `${days}-${formatClockDuration(rounded - days * DAY_MS)}`;
}

function unchanged(resources: ResourceBundle): ResourceBundle {
  return resources;
}

export function createExecutorProfile(name: string, spec: ExecutorProfileSpec): ExecutorProfile {
  switch (spec.type) {
    case "local":
      return {
        name,
        type: spec.type,
        extraSubmissionOptions: spec.extraOptions,
        resourceOverlay: (resources) =>
          Object.freeze({
            cpus: spec.cpus === undefined ? resources.cpus : Math.min(resources.cpus, spec.cpus),
            memory:
              spec.memory === undefined ? resources.memory : Math.min(resources.memory, spec.memory),
            time: resources.time,
          }),
        submissionOptions: () => [],
      };
    case "sge":
      return {
        name,
        type: spec.type,
        extraSubmissionOptions: spec.extraOptions,
        resourceOverlay: unchanged,
        submissionOptions: (resources) => {
          const memory = spec.memoryPerSlot
            ? Math.ceil(resources.memory / resources.cpus)
            : resources.memory;
          const options = [
            "-pe",
            spec.parallelEnvironment,
            String(resources.cpus),
            "-l",
            `${spec.memoryResource}=${formatGridMemory(memory)}`,
            "-l",
            `h_rt=${formatClockDuration(resources.time)}`,
          ];
          if (spec.queue) {
            options.push("-q", spec.queue);
          }
          return options;
        },
      };
    case "slurm":
      return {
        name,
        type: spec.type,
        extraSubmissionOptions: spec.extraOptions,
        resourceOverlay: unchanged,
        submissionOptions: (resources) => {
          const options = [
            `--cpus-per-task=${resources.cpus}`,
            `--mem=${toMebibytes(resources.memory)}M`,
            `--time=${formatSlurmTime(resources.time)}`,
          ];
          if (spec.partition) {
            options.push(`--partition=${spec.partition}`);
          }
          if (spec.account) {
            options.push(`--account=${spec.account}`);
          }
          return options;
        },
      };
    case "batch":
      return {
        name,
        type: spec.type,
        extraSubmissionOptions: spec.extraOptions,
        resourceOverlay: unchanged,
        submissionOptions: (resources) => [
          "--job-queue",
          spec.queue,
          "--container-overrides",
          `resourceRequirements=[{type=VCPU,value=${resources.cpus}},{type=MEMORY,value=${toMebibytes(resources.memory)}}]`,
          "--timeout",
          `attemptDurationSeconds=${Math.ceil(resources.time / SECOND_MS)}`,
        ],
      };
  }
}
