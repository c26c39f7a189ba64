// Research agent — stage 1: company overview and recent news from web search

import type {
  ExecutionContextReadView, ResearchOutput, SearchResult, StagePolicy, Subject,
} from '../types/stages.js';
import { TerminalStageError } from '../types/errors.js';
import type { SearchClient } from '../bridge/search-client.js';
import { newsQuery, overviewQuery } from '../bridge/search-queries.js';
import { BaseStage } from './base-stage.js';

export interface ResearchAgentOptions {
  /** Results per query (default: 5) */
  resultLimit?: number;
  policy?: StagePolicy;
}

function buildOverview(results: SearchResult[]): ResearchOutput['overview'] {
  const [primary, ...rest] = results;
  return {
    summary: primary.snippet,
    website: primary.url || undefined,
    keyFacts: rest.map(r => r.snippet).filter(Boolean),
  };
}

export class ResearchAgent extends BaseStage<ResearchOutput> {
  private readonly resultLimit: number;

  constructor(private readonly search: SearchClient, options: ResearchAgentOptions = {}) {
    super('research', options.policy ?? 'required', [], 'ResearchAgent');
    this.resultLimit = options.resultLimit ?? 5;
  }

  protected async perform(
    subject: Subject,
    _view: ExecutionContextReadView,
    signal: AbortSignal,
  ): Promise<ResearchOutput> {
    const company = subject.displayName;

    this.log.debug('Step 1: company overview', { company });
    const overview = await this.search.search(overviewQuery(company), { limit: this.resultLimit, signal });
    if (overview.length === 0) {
      throw new TerminalStageError(`No search results found for "${company}"`);
    }

    this.log.debug('Step 2: recent news', { company });
    const recentNews = await this.search.search(newsQuery(company), { limit: this.resultLimit, signal });

    return {
      kind: 'research',
      company,
      overview: buildOverview(overview),
      recentNews,
      sources: overview,
    };
  }
}
