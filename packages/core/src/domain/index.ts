export * from "./attempt";
export * from "./executor-profile";
export * from "./policy-config";
export * from "./resources";
export * from "./task-policy";
