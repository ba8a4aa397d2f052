/**
 * ORACLE — LLM market oracle
 * ==========================
 *
 * Concrete MarketOracle: for every question it
 *   1. gathers a market data snapshot and an intelligence search,
 *   2. hands both to the reasoning model under a kind-specific prompt.
 *
 * A failing data source ends up as an error entry in the context; only a
 * failing reasoning call rejects.
 */

import { createLogger, type Logger } from '../../common/logger.js';
import type { AnalysisKind } from '../analysis/analysis.types.js';
import { buildContext, buildSearchQuery, buildSystemPrompt } from './oracle.prompts.js';
import type {
  GatheredData,
  IntelligenceSearch,
  MarketDataSource,
  MarketOracle,
  OracleRequest,
  ReasoningModel,
} from './oracle.types.js';

export interface LlmMarketOracleDeps {
  marketData: MarketDataSource;
  search: IntelligenceSearch;
  reasoner: ReasoningModel;
  logger?: Logger;
}

export class LlmMarketOracle implements MarketOracle {
  private readonly logger: Logger;

  constructor(private readonly deps: LlmMarketOracleDeps) {
    this.logger = deps.logger ?? createLogger('MarketOracle');
  }

  trend(symbol: string): Promise<string> {
    return this.run({ kind: 'trend', symbol });
  }

  lowerLimit(symbol: string): Promise<string> {
    return this.run({ kind: 'lowerLimit', symbol });
  }

  upperLimit(symbol: string): Promise<string> {
    return this.run({ kind: 'upperLimit', symbol });
  }

  general(symbol: string, question: string): Promise<string> {
    return this.run({ kind: 'general', symbol, question });
  }

  async gather(kind: AnalysisKind, symbol: string, question?: string): Promise<GatheredData> {
    const marketData = await this.deps.marketData.getMarketData(symbol);
    const search = await this.deps.search.search(buildSearchQuery(kind, symbol, question), symbol);
    return { marketData, search };
  }

  private async run(request: OracleRequest): Promise<string> {
    const { kind, symbol, question } = request;
    const startedAt = Date.now();

    const data = await this.gather(kind, symbol, question);
    const answer = await this.deps.reasoner.complete(buildSystemPrompt(kind, symbol), buildContext(data));

    this.logger.info({ symbol, kind, latencyMs: Date.now() - startedAt }, 'Oracle answered');
    return answer;
  }
}
