import { GoogleGenerativeAI } from "@google/generative-ai";
import type { LLMProvider, ReviewRequest, ReviewResult } from "../types.js";
import { SYSTEM_PROMPT, buildUserPrompt } from "../prompts.js";
import { parseReviewResponse } from "../../review/parser.js";

export class GeminiProvider implements LLMProvider {
  readonly name = "gemini";

  async review(
    request: ReviewRequest,
    apiKey: string,
    model: string
  ): Promise<ReviewResult> {
    const genAI = new GoogleGenerativeAI(apiKey);
    const genModel = genAI.getGenerativeModel({
      model,
      systemInstruction: SYSTEM_PROMPT,
      generationConfig: { temperature: 0.1 },
    });

    const result = await genModel.generateContent(buildUserPrompt(request));
    const response = result.response;
    const usage = response.usageMetadata;

    return {
      ...parseReviewResponse(response.text()),
      usage: usage
        ? {
            promptTokens: usage.promptTokenCount ?? 0,
            completionTokens: usage.candidatesTokenCount ?? 0,
          }
        : undefined,
    };
  }
}
