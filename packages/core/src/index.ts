export * from "./domain/index";
export * from "./append-file";
export * from "./attempt-tracker";
export * from "./errors";
export * from "./escalation";
export * from "./executor-profile";
export * from "./exit-classifier";
export * from "./logger";
export * from "./policy-config-loader";
export * from "./policy-engine";
export * from "./policy-resolver";
export * from "./resolution-codes";
export * from "./resource-ceiling";
export * from "./submission-composer";
export * from "./task-policy-registry";
export * from "./units";
