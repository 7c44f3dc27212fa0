import {
  AppendFile,
  PolicyEngine,
  createLogger,
  loadPolicyConfig,
  runLogPath,
} from "@pipeline-dispatch/core";
import { applyCeilingOverrides, loadDispatcherConfig, loadEnvFile } from "./config";
import { PIPELINE_TASK_KINDS } from "./pipeline";
import {
  DryRunExecutor,
  TaskDispatcher,
  TraceWriter,
  buildSubmissionPlan,
  describeSubmission,
} from "./scheduler/index";

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadDispatcherConfig();
  const logFile = new AppendFile(runLogPath(config.logDir, config.logName));
  const logger = createLogger("Dispatcher", { minLevel: config.logLevel, sink: logFile });
  logger.info(`Logs are written to ${logFile.path}`);

  const trace = config.tracePath ? new TraceWriter(config.tracePath) : undefined;
  try {
    const policy = applyCeilingOverrides(
      await loadPolicyConfig(config.policyPath),
      config.ceilingOverrides,
    );
    const engine = PolicyEngine.fromConfig(policy, { executor: config.executor, logger });

    // A task kind without a policy is a code/config mismatch: refuse to start
    engine.validateTaskKinds(PIPELINE_TASK_KINDS);
    logger.info(`Policy loaded from ${config.policyPath}`, {
      executor: engine.profile.name,
      taskKinds: PIPELINE_TASK_KINDS.length,
      maxConcurrentTasks: config.maxConcurrentTasks,
      stopOnFatal: config.stopOnFatal,
    });

    const resourceExitCode = policy.exitCodes.resourceExhaustion[0] ?? 137;
    for (const plan of buildSubmissionPlan(engine, PIPELINE_TASK_KINDS, resourceExitCode)) {
      for (const { attempt, submission } of plan.attempts) {
        logger.info(
          `${plan.taskKind} attempt ${attempt}/${plan.maxAttempts}: ${describeSubmission(submission)}`,
        );
      }
    }

    const dispatcher = new TaskDispatcher({
      engine,
      executor: new DryRunExecutor({
        resourceKills: config.dryRunResourceKills,
        resourceExitCode,
        logger: logger.child({ component: "DryRun" }),
      }),
      maxConcurrentTasks: config.maxConcurrentTasks,
      stopOnFatal: config.stopOnFatal,
      onDecision: (decision) => trace?.record(decision),
      logger,
    });

    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    const summary = await dispatcher.run(
      PIPELINE_TASK_KINDS.map((taskKind) => ({ taskKind, instanceId: `dry-run:${taskKind}` })),
      controller.signal,
    );
    for (const outcome of summary.outcomes) {
      if (outcome.status !== "succeeded") {
        logger.warn(`${outcome.taskKind} ${outcome.status} (${outcome.reason})`, {
          attempts: outcome.attempts,
          exitCode: outcome.exitCode,
        });
      }
    }
  } finally {
    await trace?.close();
    if (trace) {
      logger.info(`Decision trace written to ${trace.path}`);
    }
    await logFile.close();
  }
}

main().catch((error) => {
  console.error("Dispatcher crashed:", error);
  process.exit(1);
});
