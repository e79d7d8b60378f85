export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  text: () => Promise<string>;
}>;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function decodeEntities(text: string): string {
  const fromCode = (code: number, fallback: string) =>
    Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : fallback;

  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, entity: string) => {
    const lower = entity.toLowerCase();
    if (lower.startsWith('#x')) return fromCode(Number.parseInt(lower.slice(2), 16), match);
    if (lower.startsWith('#')) return fromCode(Number.parseInt(lower.slice(1), 10), match);
    return NAMED_ENTITIES[lower] ?? match;
  });
}

/**
 * Reduces an HTML document to its visible text.
 */
export function stripMarkup(html: string): string {
  const withoutHidden = html
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ');
  const text = decodeEntities(withoutHidden.replace(/<[^>]+>/g, ' '));
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Fetches one page and returns its text. Throws on network errors, timeouts
 * and non-2xx responses.
 */
export async function fetchPageText(url: string, timeoutMs: number, fetchImpl: FetchLike = fetch): Promise<string> {
  const response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!response.ok) {
    throw new Error(`Fetch failed with status ${response.status}`);
  }
  return stripMarkup(await response.text());
}
