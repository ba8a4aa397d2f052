/**
 * ORACLE — Perplexity client
 * ==========================
 *
 * Market data and market intelligence both come from a Perplexity-style
 * chat completions endpoint (OpenAI-compatible wire format). Neither call
 * rejects: failures come back as `status: 'error'` results.
 */

import axios, { type AxiosInstance } from 'axios';
import { systemClock, type Clock } from '../../common/clock.js';
import { createLogger, type Logger } from '../../common/logger.js';
import { buildMarketDataQuery, buildProviderSystemPrompt } from './oracle.prompts.js';
import type {
  IntelligenceSearch,
  MarketDataSource,
  MarketSnapshot,
  SearchResult,
} from './oracle.types.js';

export interface PerplexityClientConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

const DATA_SOURCE = 'Perplexity AI (real-time search)';

/**
 * Text of the first choice of a chat completion payload, or null if the
 * payload does not have one.
 */
export function readCompletionText(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null || !('choices' in payload)) return null;
  const { choices } = payload;
  if (!Array.isArray(choices) || choices.length === 0) return null;

  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return null;
  const { message } = first;
  if (typeof message !== 'object' || message === null || !('content' in message)) return null;

  return typeof message.content === 'string' ? message.content : null;
}

export function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    return status ? `HTTP ${status}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export class PerplexityClient implements MarketDataSource, IntelligenceSearch {
  private readonly http: AxiosInstance;
  private readonly model: string;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: PerplexityClientConfig) {
    this.model = config.model;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? createLogger('Perplexity');
    this.http = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.apiKey}`,
      },
    });
  }

  async getMarketData(symbol: string): Promise<MarketSnapshot> {
    try {
      const rawAnalysis = await this.ask(symbol, buildMarketDataQuery(symbol));
      this.logger.debug?.({ symbol }, 'Market data received');

      return {
        symbol,
        status: 'success',
        rawAnalysis,
        dataSource: DATA_SOURCE,
        timestamp: this.clock.toISOString(this.clock.now()),
      };
    } catch (err) {
      const error = `Failed to fetch ${symbol} data via Perplexity: ${describeHttpError(err)}`;
      this.logger.warn({ symbol, error }, 'Market data lookup failed');
      return { symbol, status: 'error', error };
    }
  }

  async search(query: string, symbol: string): Promise<SearchResult> {
    try {
      const answer = await this.ask(symbol, query);
      return { symbol, query, status: 'success', answer };
    } catch (err) {
      const error = `Failed to search: ${describeHttpError(err)}`;
      this.logger.warn({ symbol, error }, 'Search failed');
      return { symbol, query, status: 'error', error };
    }
  }

  private async ask(symbol: string, question: string): Promise<string> {
    const response = await this.http.post<unknown>('/chat/completions', {
      model: this.model,
      messages: [
        { role: 'system', content: buildProviderSystemPrompt(symbol) },
        { role: 'user', content: question },
      ],
    });

    const text = readCompletionText(response.data);
    if (text === null) {
      throw new Error('Completion response has no message content');
    }
    return text;
  }
}
