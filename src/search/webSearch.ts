import type { GenerationClient } from '../analysis/generation.js';
import type { SearchConfig } from '../runtime/botConfig.js';
import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { fetchPageText } from './pageFetcher.js';
import type { SearchProvider } from './searchProvider.js';

export const NOTHING_FOUND = "I couldn't find any relevant information.";
export const SEARCH_FAILED = "Sorry, I couldn't perform the web search at this time.";

export type SearchSummary = {
  summary: string;
  links: string[];
};

export type WebSearchClientOptions = {
  provider: SearchProvider;
  generation: GenerationClient;
  logger: RuntimeLogger;
  search: SearchConfig;
  fetchPage?: (url: string, timeoutMs: number) => Promise<string>;
};

export interface WebSearchClient {
  searchAndSummarize(query: string): Promise<SearchSummary>;
}

export function buildSummaryPrompt(query: string, pageTexts: string[]): string {
  return `Summarize these search results for '${query}': ${pageTexts.join('\n')}`;
}

export function createWebSearchClient(options: WebSearchClientOptions): WebSearchClient {
  const { provider, generation, logger, search } = options;
  const fetchPage = options.fetchPage ?? ((url: string, timeoutMs: number) => fetchPageText(url, timeoutMs));

  const collectPageTexts = async (links: string[]): Promise<string[]> => {
    const pageTexts: string[] = [];
    for (const link of links.slice(0, search.fetchCount)) {
      try {
        const text = await fetchPage(link, search.fetchTimeoutMs);
        pageTexts.push(text.slice(0, search.maxPageChars));
      } catch (err) {
        logger.warn('page fetch failed', { link, error: serializeError(err) });
      }
    }
    return pageTexts;
  };

  return {
    async searchAndSummarize(query) {
      try {
        const links = await provider.search(query, search.maxResults);
        const pageTexts = await collectPageTexts(links);

        if (pageTexts.length === 0) {
          return { summary: NOTHING_FOUND, links };
        }

        const summary = await generation.generateText(buildSummaryPrompt(query, pageTexts));
        return { summary, links };
      } catch (err) {
        logger.error('web search failed', { query, error: serializeError(err) });
        return { summary: SEARCH_FAILED, links: [] };
      }
    },
  };
}
