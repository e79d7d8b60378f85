import { Agent, run, webSearchTool } from '@openai/agents';
import { z } from 'zod';

export const searchProviderDeps = { run };

const SearchLinksSchema = z.object({
  links: z.array(z.string()),
});

/**
 * Returns result page URLs for a query, best match first.
 */
export interface SearchProvider {
  search(query: string, maxResults: number): Promise<string[]>;
}

export function buildSearchAgent(model: string) {
  return new Agent({
    name: 'WebSearch',
    model,
    instructions: [
      'You find web pages for a search query.',
      'Call the web search tool with the query, then return the URLs of the most relevant result pages, best match first.',
      'Return only absolute http(s) URLs of pages you actually found. Do not invent URLs.',
    ].join('\n'),
    tools: [webSearchTool()],
    outputType: SearchLinksSchema,
  });
}

export function normalizeLinks(links: string[], maxResults: number): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const link of links) {
    const trimmed = link.trim();
    if (!URL.canParse(trimmed)) continue;
    const protocol = new URL(trimmed).protocol;
    if (protocol !== 'http:' && protocol !== 'https:') continue;
    if (seen.has(trimmed)) continue;
    seen.add(trimmed);
    out.push(trimmed);
    if (out.length >= maxResults) break;
  }
  return out;
}

export function createAgentsSearchProvider(model: string): SearchProvider {
  const agent = buildSearchAgent(model);

  return {
    async search(query, maxResults) {
      const result = await searchProviderDeps.run(
        agent,
        `Search query: ${query}\nReturn at most ${maxResults} URLs.`,
      );
      const parsed = SearchLinksSchema.safeParse(result.finalOutput);
      if (!parsed.success) {
        throw new Error(`Search agent returned malformed output: ${parsed.error.message}`);
      }
      return normalizeLinks(parsed.data.links, maxResults);
    },
  };
}
