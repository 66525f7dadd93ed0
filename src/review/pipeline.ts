import { RequestError, type Octokit } from "octokit";
import { fetchCompareDiff, fetchPRDiff } from "../github/client.js";
import type { PRDetails } from "../github/event.js";
import { fetchRepoConfig, mergeSettings, type ReviewSettings } from "../repo-config.js";
import { withRetry, isRetryableError } from "../utils/retry.js";
import { logger, type Logger } from "../logger.js";
import type { LLMProvider, ReviewComment, TokenUsage } from "../llm/types.js";
import { parseDiff, filterFiles, chunkDiffs, type FileDiff } from "./differ.js";
import { partitionComments } from "./validator.js";
import { buildReviewPayload, postReviewToGitHub, type ReviewPayload } from "./poster.js";

export interface ReviewDeps {
  octokit: Octokit;
  provider: LLMProvider;
  apiKey: string;
  model: string;
}

export type ReviewOutcome =
  | { status: "skipped"; reason: string }
  | {
      status: "posted" | "dry-run";
      payload: ReviewPayload;
      commentCount: number;
      usage: TokenUsage;
    };

async function fetchCompareFiles(
  octokit: Octokit,
  details: PRDetails,
  base: string,
  head: string,
  log: Logger
): Promise<FileDiff[] | null> {
  try {
    const compareDiff = await withRetry(
      () => fetchCompareDiff(octokit, details.owner, details.repo, base, head),
      { shouldRetry: isRetryableError }
    );
    return parseDiff(compareDiff);
  } catch (err) {
    // Force-pushes can leave `before` unreachable.
    if (err instanceof RequestError && (err.status === 404 || err.status === 422)) {
      log.warn("Pushed range unavailable, reviewing the full PR diff", {
        base,
        head,
        status: err.status,
      });
      return null;
    }
    throw err;
  }
}

async function fetchReviewFiles(
  octokit: Octokit,
  details: PRDetails,
  log: Logger
): Promise<{ reviewed: FileDiff[]; commentable: FileDiff[] }> {
  const prDiff = await withRetry(
    () => fetchPRDiff(octokit, details.owner, details.repo, details.pullNumber),
    { shouldRetry: isRetryableError }
  );
  const commentable = parseDiff(prDiff);

  // On new pushes only the commits since the last review are sent to the model.
  const { before, after } = details;
  if (details.action !== "synchronize" || !before || !after) {
    return { reviewed: commentable, commentable };
  }

  const pushed = await fetchCompareFiles(octokit, details, before, after, log);
  if (!pushed) {
    return { reviewed: commentable, commentable };
  }

  // A merge of the base branch brings in files the PR itself does not change.
  const prPaths = new Set(commentable.map((file) => file.path));
  return {
    reviewed: pushed.filter((file) => prPaths.has(file.path)),
    commentable,
  };
}

export async function runReview(
  details: PRDetails,
  inputs: ReviewSettings,
  deps: ReviewDeps
): Promise<ReviewOutcome> {
  const log = logger.withContext({
    repo: `${details.owner}/${details.repo}`,
    pr: details.pullNumber,
    action: details.action,
    provider: deps.provider.name,
  });

  const repoConfig = await fetchRepoConfig(
    deps.octokit,
    details.owner,
    details.repo,
    details.baseRef
  );
  const settings = mergeSettings(inputs, repoConfig);

  if (!settings.enabled) {
    log.info("Review disabled via repo config");
    return { status: "skipped", reason: "Disabled via repo config" };
  }

  const { reviewed, commentable } = await fetchReviewFiles(deps.octokit, details, log);
  const filtered = filterFiles(reviewed, settings.exclude, settings.maxFiles);

  log.info("Collected diff", {
    files: reviewed.length,
    reviewable: filtered.length,
  });

  if (filtered.length === 0) {
    return { status: "skipped", reason: "No reviewable files." };
  }

  const chunks = chunkDiffs(filtered, settings.maxChunkChars);
  const summaries: string[] = [];
  const comments: ReviewComment[] = [];
  const usage: TokenUsage = { promptTokens: 0, completionTokens: 0 };

  for (const [index, chunk] of chunks.entries()) {
    log.debug("Requesting review", { chunk: index + 1, of: chunks.length });
    const result = await withRetry(
      () =>
        deps.provider.review(
          {
            diff: chunk,
            prTitle: details.title,
            prDescription: details.description,
            customInstructions: settings.customInstructions,
          },
          deps.apiKey,
          deps.model
        ),
      { maxAttempts: 3, shouldRetry: isRetryableError }
    );

    comments.push(...result.comments);
    if (result.summary) summaries.push(result.summary);
    if (result.usage) {
      usage.promptTokens += result.usage.promptTokens;
      usage.completionTokens += result.usage.completionTokens;
    }
  }

  const partitioned = partitionComments(comments, commentable);
  if (partitioned.outOfDiff.length > 0) {
    log.warn("Comments outside the diff moved to the summary", {
      count: partitioned.outOfDiff.length,
    });
  }

  const payload = buildReviewPayload(
    summaries.join("\n\n"),
    partitioned,
    settings.reviewStyle
  );
  const commentCount = partitioned.inline.length + partitioned.outOfDiff.length;

  if (settings.dryRun) {
    log.info("Dry run, review not posted", {
      body: payload.body,
      comments: payload.comments,
    });
    return { status: "dry-run", payload, commentCount, usage };
  }

  if (!payload.body && payload.comments.length === 0) {
    log.info("Nothing to post");
    return { status: "skipped", reason: "Nothing to post" };
  }

  await postReviewToGitHub(
    deps.octokit,
    details.owner,
    details.repo,
    details.pullNumber,
    details.headSha,
    payload
  );

  log.info("Review posted", {
    commentCount,
    inline: payload.comments.length,
    promptTokens: usage.promptTokens,
    completionTokens: usage.completionTokens,
  });

  return { status: "posted", payload, commentCount, usage };
}
