import type { ReviewComment, Severity } from "../llm/types.js";

export interface ParsedReview {
  summary: string;
  comments: ReviewComment[];
}

const SEVERITIES: Record<string, Severity> = {
  critical: "critical",
  warning: "warning",
  suggestion: "suggestion",
  nitpick: "nitpick",
};

const COMMENT_REGEX =
  /###\s*\[(CRITICAL|WARNING|SUGGESTION|NITPICK)\]\s*(.+?):(\d+)`?\s*\n([\s\S]*?)(?=###\s*\[|$)/gi;

const SUMMARY_REGEX = /##\s*Summary\s*\n([\s\S]*?)(?=##\s*Comments|$)/i;

export function parseReviewResponse(raw: string): ParsedReview {
  const summaryMatch = SUMMARY_REGEX.exec(raw);
  const summary = summaryMatch ? summaryMatch[1].trim() : raw.split("\n")[0].trim();

  const comments: ReviewComment[] = [];
  for (const match of raw.matchAll(COMMENT_REGEX)) {
    const severity = SEVERITIES[match[1].toLowerCase()];
    const path = match[2].trim().replace(/^`|`$/g, "");
    const line = parseInt(match[3], 10);
    const body = match[4].trim();

    if (severity && path && line > 0 && body) {
      comments.push({ path, line, body, severity });
    }
  }

  return { summary, comments };
}
