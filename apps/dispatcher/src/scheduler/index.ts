export * from "./dry-run-executor";
export * from "./submission-plan";
export * from "./task-dispatcher";
export * from "./task-executor";
export * from "./trace";
