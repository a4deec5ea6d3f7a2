import { z } from 'zod';
import { fetchJSON } from '../util/fetch.js';
import { classifyFailure } from './errors.js';
import type { AdapterOutcome, FetchOptions, GatherRequest, ImageRef, ProviderAdapter } from './types.js';

const CSE_URL = 'https://www.googleapis.com/customsearch/v1';

const SearchSchema = z.object({
  items: z.array(z.object({ link: z.string(), title: z.string() })).optional(),
});

/** The destination plus up to three `destination interest` queries. */
export function imageQueries(req: GatherRequest): string[] {
  return [req.destination, ...req.interests.slice(0, 3).map((i) => `${req.destination} ${i}`)];
}

/** Google Custom Search in image mode, one result per query. */
export class GoogleImagesAdapter implements ProviderAdapter<'images'> {
  readonly source = 'images' as const;
  readonly configured: boolean;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly engineId: string | undefined,
  ) {
    this.configured = Boolean(apiKey && engineId);
  }

  async fetch(req: GatherRequest, opts: FetchOptions): Promise<AdapterOutcome<'images'>> {
    try {
      const images = await Promise.all(
        imageQueries(req).map(async (query): Promise<ImageRef> => {
          const params = new URLSearchParams({
            key: this.apiKey ?? '',
            cx: this.engineId ?? '',
            q: query,
            searchType: 'image',
            num: '1',
            safe: 'active',
          });
          const body = SearchSchema.parse(
            await fetchJSON(`${CSE_URL}?${params.toString()}`, {
              timeoutMs: opts.timeoutMs,
              signal: opts.signal,
              target: 'google:cse',
            }),
          );
          const first = body.items?.[0];
          return { query, url: first?.link ?? null, title: first?.title ?? query, estimated: false };
        }),
      );
      return { ok: true, payload: { source: 'images', images } };
    } catch (err) {
      return { ok: false, failure: classifyFailure(err) };
    }
  }
}
