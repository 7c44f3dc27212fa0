import {
  AppendFile,
  formatDuration,
  formatMemory,
  type DispatchDecision,
} from "@pipeline-dispatch/core";

export interface TraceRecord {
  timestamp: string;
  instanceId: string;
  taskKind: string;
  attempt: number;
  action: DispatchDecision["action"];
  reason: DispatchDecision["reason"];
  exitCode: number | null;
  executor: string | null;
  cpus: number | null;
  memory: number | null;
  time: number | null;
}

export const TRACE_COLUMNS = [
  "timestamp",
  "instance_id",
  "task_kind",
  "attempt",
  "action",
  "reason",
  "exit_code",
  "executor",
  "cpus",
  "memory",
  "time",
] as const;

export function toTraceRecord(decision: DispatchDecision, now: Date = new Date()): TraceRecord {
  const resources = decision.submission?.resources;
  return {
    timestamp: now.toISOString(),
    instanceId: decision.instanceId,
    taskKind: decision.taskKind,
    attempt: decision.attempt,
    action: decision.action,
    reason: decision.reason,
    exitCode: decision.exitCode,
    executor: decision.submission?.profileName ?? null,
    cpus: resources?.cpus ?? null,
    memory: resources?.memory ?? null,
    time: resources?.time ?? null,
  };
}

function cell(value: string | number | null): string {
  return value === null ? "-" : String(value);
}

export function formatTraceRow(record: TraceRecord): string {
  return [
    record.timestamp,
    record.instanceId,
    record.taskKind,
    record.attempt,
    record.action,
    record.reason,
    record.exitCode,
    record.executor,
    record.cpus,
    record.memory === null ? null : formatMemory(record.memory),
    record.time === null ? null : formatDuration(record.time),
  ]
    .map(cell)
    .join("\t");
}

export function formatTrace(records: readonly TraceRecord[]): string {
  return [TRACE_COLUMNS.join("\t"), ...records.map(formatTraceRow)].join("\n");
}

// Appends one row per decision; the header is written only to a new file
export class TraceWriter {
  private readonly file: AppendFile;

  constructor(path: string) {
    this.file = new AppendFile(path);
    if (this.file.isNew) {
      this.file.writeLine(TRACE_COLUMNS.join("\t"));
    }
  }

  get path(): string {
    return this.file.path;
  }

  // Throws once the trace file has failed to open or write
  record(decision: DispatchDecision, now?: Date): void {
    const { error } = this.file;
    if (error) {
      throw error;
    }
    this.file.writeLine(formatTraceRow(toTraceRecord(decision, now)));
  }

  close(): Promise<void> {
    return this.file.close();
  }
}
