import {
  resolveApiKey,
  resolveModel,
  type Config,
} from "./config.js";
import {
  getPRDetails,
  isSupportedAction,
  parsePullRequestEvent,
  readGitHubEvent,
} from "./github/event.js";
import { createOctokit } from "./github/client.js";
import { getProvider } from "./llm/registry.js";
import { runReview, type ReviewOutcome } from "./review/pipeline.js";
import type { ReviewSettings } from "./repo-config.js";
import { logger } from "./logger.js";

export type ActionOutcome =
  | ReviewOutcome
  | { status: "ignored"; action: string; reason: string };

export function settingsFromConfig(config: Config): ReviewSettings {
  return {
    exclude: config.INPUT_EXCLUDE,
    customInstructions: config.INPUT_CUSTOM_INSTRUCTIONS,
    maxFiles: config.INPUT_MAX_FILES,
    maxChunkChars: config.INPUT_MAX_CHUNK_CHARS,
    reviewStyle: config.INPUT_REVIEW_STYLE,
    enabled: true,
    dryRun: config.DRY_RUN,
  };
}

export async function runAction(config: Config): Promise<ActionOutcome> {
  const event = parsePullRequestEvent(
    await readGitHubEvent(config.GITHUB_EVENT_PATH)
  );

  if (!isSupportedAction(event.action)) {
    logger.info("Unsupported pull_request action, nothing to do", {
      action: event.action,
    });
    return {
      status: "ignored",
      action: event.action,
      reason: "Unsupported action",
    };
  }

  if (event.pull_request.draft) {
    logger.info("Draft pull request, skipping review", { pr: event.number });
    return { status: "ignored", action: event.action, reason: "Draft pull request" };
  }

  const details = getPRDetails(event);
  const model = resolveModel(config);

  logger.info("Reviewing pull request", {
    repo: `${details.owner}/${details.repo}`,
    pr: details.pullNumber,
    provider: config.LLM_PROVIDER,
    model,
  });

  return runReview(details, settingsFromConfig(config), {
    octokit: createOctokit(config.GITHUB_TOKEN),
    provider: getProvider(config.LLM_PROVIDER),
    apiKey: resolveApiKey(config),
    model,
  });
}
