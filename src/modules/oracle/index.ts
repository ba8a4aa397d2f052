/**
 * ORACLE MODULE — Index
 */

export * from './oracle.types.js';
export * from './oracle.prompts.js';
export * from './perplexity.client.js';
export * from './openai.reasoner.js';
export * from './llm-market.oracle.js';

import type { Env } from '../../config/env.js';
import { LlmMarketOracle } from './llm-market.oracle.js';
import { OpenAiReasoner } from './openai.reasoner.js';
import { PerplexityClient } from './perplexity.client.js';

/**
 * Wire the production oracle from environment settings.
 */
export function createMarketOracle(env: Readonly<Env>): LlmMarketOracle {
  const perplexity = new PerplexityClient({
    apiKey: env.PERPLEXITY_API_KEY,
    baseURL: env.PERPLEXITY_BASE_URL,
    model: env.PERPLEXITY_MODEL,
    timeoutMs: env.HTTP_TIMEOUT_MS,
  });

  const reasoner = new OpenAiReasoner({
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    temperature: env.OPENAI_TEMPERATURE,
    timeoutMs: env.HTTP_TIMEOUT_MS,
  });

  return new LlmMarketOracle({ marketData: perplexity, search: perplexity, reasoner });
}
