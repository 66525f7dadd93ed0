import type { ReviewRequest } from "./types.js";

export const SYSTEM_PROMPT = `You are a senior code reviewer. Analyze the following diff from a pull request and generate useful comments for a code review, with actionable recommendations.

Your response MUST follow this exact format:

## Summary
<A brief overall assessment of the PR in 2-3 sentences>

## Comments
<For each issue found, use this exact format:>

### [SEVERITY] path/to/file.ts:LINE_NUMBER
<Your review comment explaining the issue and suggesting a fix>

Where SEVERITY is one of: CRITICAL, WARNING, SUGGESTION, NITPICK

Rules:
- Comment on a code chunk only if improvements can be made
- LINE_NUMBER must be a line number in the new version of the file, taken from the diff (lines starting with + or a space)
- Avoid duplicating recommendations and never comment on deleted files or removed lines
- Focus on bugs, security issues, performance problems, and code quality
- If the code looks good, just provide a positive summary with no comments
- Keep comments concise`;

export function buildUserPrompt(request: ReviewRequest): string {
  let prompt = `# Pull Request: ${request.prTitle}\n\n`;
  const description = request.prDescription.trim();
  if (description) {
    prompt += `## Description\n${description}\n\n`;
  }
  if (request.customInstructions) {
    prompt += `## Additional Instructions\n${request.customInstructions}\n\n`;
  }
  prompt += `## Diff\n\`\`\`diff\n${request.diff}\n\`\`\``;
  return prompt;
}
