/**
 * ORACLE — OpenAI reasoning model
 *
 * One system + one user message in, the assistant's text out.
 */

import OpenAI from 'openai';
import type { ReasoningModel } from './oracle.types.js';

export interface OpenAiReasonerConfig {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  baseURL?: string;
}

export class OpenAiReasoner implements ReasoningModel {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;

  constructor(config: OpenAiReasonerConfig) {
    this.model = config.model;
    this.temperature = config.temperature;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
      });

      return completion.choices[0]?.message.content ?? '';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`OpenAI API error: ${message}`);
    }
  }
}
