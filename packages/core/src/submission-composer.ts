import type { ExecutorType } from "./domain/executor-profile";
import type { PolicyConfig } from "./domain/policy-config";
import {
  mergeResources,
  type PartialResourceBundle,
  type ResourceBundle,
} from "./domain/resources";
import type { ExecutorProfile } from "./executor-profile";
import { createLogger, type Logger } from "./logger";
import type { ResourceCeilingTable } from "./resource-ceiling";

export interface SubmissionRequest {
  instanceId: string;
  taskKind: string;
  attempt: number;
  executor: ExecutorType;
  profileName: string;
  groupLabel: string | null;
  resources: ResourceBundle;
  submissionOptions: string[];
  extraSubmissionOptions: string;
}

export interface SubmissionTarget {
  instanceId: string;
  taskKind: string;
  attempt: number;
}

/**
 * Merges the resource group override over the resolved bundle, re-applies
 * the ceilings, then hands the result to the executor overlay.
 */
export class SubmissionComposer {
  private readonly groups: ReadonlyMap<string, PartialResourceBundle>;

  constructor(
    groups: Iterable<[string, PartialResourceBundle]>,
    private readonly ceilings: ResourceCeilingTable,
    private readonly logger: Logger = createLogger("Composer"),
  ) {
    this.groups = new Map(groups);
  }

  static fromConfig(
    config: PolicyConfig,
    ceilings: ResourceCeilingTable,
    logger?: Logger,
  ): SubmissionComposer {
    return new SubmissionComposer(Object.entries(config.resourceGroups), ceilings, logger);
  }

  groupLabels(): string[] {
    return [...this.groups.keys()];
  }

  compose(
    resolved: ResourceBundle,
    groupLabel: string | null,
    profile: ExecutorProfile,
    target: SubmissionTarget,
  ): SubmissionRequest {
    let resources = resolved;
    if (groupLabel !== null) {
      const override = this.groups.get(groupLabel);
      if (override) {
        resources = this.ceilings.clampBundle(mergeResources(resolved, override));
      } else {
        this.logger.warn(`Unknown resource group "${groupLabel}" ignored`, {
          taskKind: target.taskKind,
          instanceId: target.instanceId,
        });
      }
    }

    const overlaid = profile.resourceOverlay(resources);
    return {
      ...target,
      executor: profile.type,
      profileName: profile.name,
      groupLabel,
      resources: overlaid,
      submissionOptions: profile.submissionOptions(overlaid),
      extraSubmissionOptions: profile.extraSubmissionOptions,
    };
  }
}
