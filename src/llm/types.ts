export type Severity = "critical" | "warning" | "suggestion" | "nitpick";

export interface ReviewRequest {
  diff: string;
  prTitle: string;
  prDescription: string;
  customInstructions?: string;
}

export interface ReviewComment {
  path: string;
  line: number;
  body: string;
  severity: Severity;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface ReviewResult {
  summary: string;
  comments: ReviewComment[];
  usage?: TokenUsage;
}

export interface LLMProvider {
  readonly name: string;
  review(
    request: ReviewRequest,
    apiKey: string,
    model: string
  ): Promise<ReviewResult>;
}
