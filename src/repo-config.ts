import YAML from "yaml";
import { z } from "zod";
import type { Octokit } from "octokit";
import { fetchFileContent } from "./github/client.js";
import type { ReviewStyle } from "./config.js";
import { logger } from "./logger.js";

export const REPO_CONFIG_PATH = ".airecommender.yml";

const repoConfigSchema = z
  .object({
    exclude: z.array(z.string()).optional(),
    customInstructions: z.string().optional(),
    maxFiles: z.number().int().positive().optional(),
    reviewStyle: z.enum(["inline", "summary", "both"]).optional(),
    enabled: z.boolean().optional(),
  })
  .strict();

export type RepoConfig = z.infer<typeof repoConfigSchema>;

export interface ReviewSettings {
  exclude: string[];
  customInstructions?: string;
  maxFiles: number;
  maxChunkChars: number;
  reviewStyle: ReviewStyle;
  enabled: boolean;
  dryRun: boolean;
}

export function parseRepoConfig(content: string): RepoConfig | null {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    logger.warn(`Failed to parse ${REPO_CONFIG_PATH}`, { error: String(err) });
    return null;
  }

  // An empty file parses to null.
  if (parsed === null || parsed === undefined) return {};

  const result = repoConfigSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn(`Ignoring invalid ${REPO_CONFIG_PATH}`, {
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
    return null;
  }
  return result.data;
}

export async function fetchRepoConfig(
  octokit: Octokit,
  owner: string,
  repo: string,
  ref: string
): Promise<RepoConfig | null> {
  const content = await fetchFileContent(
    octokit,
    owner,
    repo,
    REPO_CONFIG_PATH,
    ref
  );
  if (content === null) return null;
  return parseRepoConfig(content);
}

export function mergeSettings(
  inputs: ReviewSettings,
  repoConfig: RepoConfig | null
): ReviewSettings {
  return {
    ...inputs,
    exclude: [...inputs.exclude, ...(repoConfig?.exclude ?? [])],
    customInstructions:
      repoConfig?.customInstructions ?? inputs.customInstructions,
    maxFiles: repoConfig?.maxFiles ?? inputs.maxFiles,
    reviewStyle: repoConfig?.reviewStyle ?? inputs.reviewStyle,
    enabled: repoConfig?.enabled ?? inputs.enabled,
  };
}
