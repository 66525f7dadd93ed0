import type { Octokit } from "octokit";
import { postReview, type InlineComment } from "../github/client.js";
import type { ReviewStyle } from "../config.js";
import type { ReviewComment, Severity } from "../llm/types.js";
import type { PartitionedComments } from "./validator.js";

const SEVERITY_EMOJI: Record<Severity, string> = {
  critical: "🔴",
  warning: "🟡",
  suggestion: "🔵",
  nitpick: "⚪",
};

export interface ReviewPayload {
  body: string;
  comments: InlineComment[];
}

function formatNote(comment: ReviewComment): string {
  const body = comment.body.replace(/\n+/g, " ");
  return `- **${comment.severity.toUpperCase()}** \`${comment.path}:${comment.line}\`: ${body}`;
}

export function formatSummary(
  summary: string,
  inlineCount: number,
  notes: ReviewComment[] = []
): string {
  let body = `## AI Review Summary\n\n${summary}\n\n`;
  if (notes.length > 0) {
    body += `### Additional notes\n\n${notes.map(formatNote).join("\n")}\n\n`;
  }
  if (inlineCount > 0) {
    body += `---\n*${inlineCount} inline comment(s) posted.*`;
  } else if (notes.length === 0) {
    body += `---\n*No issues found. Looks good!*`;
  } else {
    body += `---\n*No inline comments posted.*`;
  }
  return body;
}

export function formatInlineComment(comment: ReviewComment): string {
  const emoji = SEVERITY_EMOJI[comment.severity];
  return `${emoji} **${comment.severity.toUpperCase()}**\n\n${comment.body}`;
}

export function buildReviewPayload(
  summary: string,
  partitioned: PartitionedComments,
  reviewStyle: ReviewStyle
): ReviewPayload {
  if (reviewStyle === "summary") {
    const notes = [...partitioned.inline, ...partitioned.outOfDiff];
    return { body: formatSummary(summary, 0, notes), comments: [] };
  }

  const comments = partitioned.inline.map((c) => ({
    path: c.path,
    line: c.line,
    body: formatInlineComment(c),
  }));

  // Out-of-diff comments can only be delivered through the review body.
  if (reviewStyle === "inline" && partitioned.outOfDiff.length === 0) {
    return { body: "", comments };
  }

  return {
    body: formatSummary(summary, comments.length, partitioned.outOfDiff),
    comments,
  };
}

export async function postReviewToGitHub(
  octokit: Octokit,
  owner: string,
  repo: string,
  pullNumber: number,
  commitSha: string,
  payload: ReviewPayload
): Promise<void> {
  await postReview(
    octokit,
    owner,
    repo,
    pullNumber,
    commitSha,
    payload.body,
    payload.comments
  );
}
