import type { SearchPage } from '../../adapters/PlacesProvider';
import { RunCancelled } from '../../errors';
import { sleep } from '../../utils/sleep';

export interface PaginateOptions {
  maxPages: number;
  /** Wait before using a next-page token; the provider needs a moment to activate it */
  pageDelayMs: number;
  signal?: AbortSignal;
}

export interface PaginateOutcome {
  pages: SearchPage[];
  /** Set when a page failed; pages fetched before it are kept */
  error?: unknown;
  /** True when the page cap stopped the loop while more pages existed */
  truncated: boolean;
}

/**
 * Fetch pages until the provider stops handing out tokens, the page cap is
 * reached, a page fails, or the signal aborts.
 */
export async function paginate(
  fetchPage: (pageToken: string | undefined) => Promise<SearchPage>,
  options: PaginateOptions,
): Promise<PaginateOutcome> {
  const pages: SearchPage[] = [];
  let pageToken: string | undefined;

  for (let page = 0; page < options.maxPages; page++) {
    try {
      if (options.signal?.aborted) throw new RunCancelled();
      if (page > 0) await sleep(options.pageDelayMs, options.signal);

      const result = await fetchPage(pageToken);
      pages.push(result);

      if (!result.nextPageToken) {
        return { pages, truncated: false };
      }
      pageToken = result.nextPageToken;
    } catch (error) {
      return { pages, error, truncated: false };
    }
  }

  return { pages, truncated: true };
}
