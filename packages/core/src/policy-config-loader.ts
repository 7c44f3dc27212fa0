import { readFile } from "node:fs/promises";
import type { ZodIssue } from "zod";
import { PolicyConfigSchema, type PolicyConfig } from "./domain/policy-config";
import { PolicyConfigError } from "./errors";

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

export function parsePolicyConfig(raw: unknown, source = "policy config"): PolicyConfig {
  const result = PolicyConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new PolicyConfigError(`Invalid ${source}`, result.error.issues.map(formatIssue));
  }
  return result.data;
}

export async function loadPolicyConfig(path: string): Promise<PolicyConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new PolicyConfigError(
      `Cannot read policy file ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PolicyConfigError(
      `Policy file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parsePolicyConfig(raw, `policy file ${path}`);
}
