import type { ProviderName } from "../config.js";
import type { LLMProvider } from "./types.js";
import { OpenAIProvider } from "./providers/openai.js";
import { AnthropicProvider } from "./providers/anthropic.js";
import { GeminiProvider } from "./providers/gemini.js";

const providers: Record<ProviderName, LLMProvider> = {
  openai: new OpenAIProvider(),
  anthropic: new AnthropicProvider(),
  gemini: new GeminiProvider(),
};

function isProviderName(name: string): name is ProviderName {
  return Object.hasOwn(providers, name);
}

export function getProvider(name: string): LLMProvider {
  if (!isProviderName(name)) {
    throw new Error(`Unknown LLM provider: ${name}`);
  }
  return providers[name];
}

export function listProviders(): ProviderName[] {
  return Object.keys(providers).filter(isProviderName);
}
