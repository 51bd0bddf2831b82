import { z } from 'zod';
import {
  RestAction,
  RestEndpoint,
  producerOf,
  type Decoder,
  type EndpointRequestOptions,
  type RestActionContext,
  type RestActionOptions,
  type RestProducer,
} from '@rest-action/core';

/** One page of a cursor-linked collection, as returned by the remote API. */
export interface PagingObject<TItem> {
  items: TItem[];
  /** Absolute URL of the next page; absent or null on the last page. */
  next?: string | null;
  previous?: string | null;
  total?: number;
  limit?: number;
  offset?: number;
}

export interface Page<TItem> {
  index: number;
  items: TItem[];
  raw: PagingObject<TItem>;
}

export interface PaginationLimits {
  maxPages?: number;
  maxItems?: number;
}

export type TruncationReason = 'maxPages' | 'maxItems';

export interface PaginationResult<TItem> {
  pages: Page<TItem>[];
  items: TItem[];
  pageCount: number;
  itemCount: number;
  truncated: boolean;
  truncationReason?: TruncationReason;
}

/** Builds the action that loads the page behind a `next` link. */
export type PageFetcher<TItem> = (url: string) => RestAction<PagingObject<TItem>>;

function getLimits(limits?: PaginationLimits): Required<PaginationLimits> {
  return {
    maxPages: limits?.maxPages ?? Infinity,
    maxItems: limits?.maxItems ?? Infinity,
  };
}

/**
 * A RestAction for the first page of a collection that can also walk the
 * remaining pages. Each page is loaded through its own RestAction, so pages
 * are cached, rate-limit retried and token-checked individually.
 */
export class PagingRestAction<TItem> extends RestAction<PagingObject<TItem>> {
  constructor(
    context: RestActionContext,
    source: RestProducer<PagingObject<TItem>>,
    private readonly fetchPage: PageFetcher<TItem>,
    options?: RestActionOptions,
  ) {
    super(context, source, options);
  }

  /** Every page, starting with this one, until `next` runs out or a limit is hit. */
  getAllPages(limits?: PaginationLimits): RestAction<PaginationResult<TItem>> {
    return new RestAction(this.context, producerOf(() => this.collect(limits)), {
      operation: `${this.options.operation ?? 'paging'}.pages`,
    });
  }

  /** The concatenated items of {@link getAllPages}, cut to `maxItems`. */
  getAllItems(limits?: PaginationLimits): RestAction<TItem[]> {
    return new RestAction(this.context, producerOf(async () => (await this.collect(limits)).items), {
      operation: `${this.options.operation ?? 'paging'}.items`,
    });
  }

  /**
   * Yields pages as they arrive. The generator's return value is the same
   * summary {@link getAllPages} resolves with.
   */
  async *stream(limits?: PaginationLimits): AsyncGenerator<Page<TItem>, PaginationResult<TItem>, void> {
    const { maxPages, maxItems } = getLimits(limits);
    const pages: Page<TItem>[] = [];
    let items: TItem[] = [];
    let truncationReason: TruncationReason | undefined;
    let action: RestAction<PagingObject<TItem>> | undefined = this;

    while (action) {
      if (pages.length >= maxPages) {
        truncationReason = 'maxPages';
        break;
      }
      if (items.length >= maxItems) {
        truncationReason = 'maxItems';
        break;
      }

      const raw: PagingObject<TItem> = await action.complete();
      const page: Page<TItem> = { index: pages.length, items: raw.items, raw };
      pages.push(page);
      this.context.logger?.debug('rest.pagination.page', {
        operation: this.options.operation,
        index: page.index,
        itemCount: page.items.length,
      });

      const room = maxItems - items.length;
      if (page.items.length > room) {
        items = items.concat(page.items.slice(0, room));
        truncationReason = 'maxItems';
        yield page;
        break;
      }
      items = items.concat(page.items);
      yield page;

      action = raw.next && raw.items.length > 0 ? this.fetchPage(raw.next) : undefined;
    }

    return {
      pages,
      items,
      pageCount: pages.length,
      itemCount: items.length,
      truncated: truncationReason !== undefined,
      truncationReason,
    };
  }

  private async collect(limits?: PaginationLimits): Promise<PaginationResult<TItem>> {
    const iterator = this.stream(limits);
    for (;;) {
      const step = await iterator.next();
      if (step.done) return step.value;
    }
  }
}

const pagingEnvelopeSchema = z.object({
  items: z.array(z.unknown()),
  next: z.string().nullish(),
  previous: z.string().nullish(),
  total: z.number().optional(),
  limit: z.number().optional(),
  offset: z.number().optional(),
});

/** Validates a paging envelope and decodes each item with `decodeItem`. */
export function decodePagingObject<TItem>(body: unknown, decodeItem: Decoder<TItem>): PagingObject<TItem> {
  const envelope = pagingEnvelopeSchema.parse(body);
  return { ...envelope, items: envelope.items.map((item) => decodeItem(item)) };
}

/**
 * RestEndpoint with a `getPaging` verb for collection endpoints.
 *
 * @example
 * ```typescript
 * class PlaylistsApi extends PagingEndpoint {
 *   listTracks(playlistId: string) {
 *     return this.getPaging(`/playlists/${playlistId}/tracks`, (item) => trackSchema.parse(item), {
 *       query: { limit: 50 },
 *     });
 *   }
 * }
 *
 * const tracks = await api.listTracks('abc').getAllItems({ maxItems: 500 }).complete();
 * ```
 */
export class PagingEndpoint extends RestEndpoint {
  protected getPaging<TItem>(
    path: string,
    decodeItem: Decoder<TItem>,
    options: EndpointRequestOptions = {},
  ): PagingRestAction<TItem> {
    const decodePage = (body: unknown) => decodePagingObject(body, decodeItem);
    const first = this.get(path, decodePage, options);
    const fetchPage: PageFetcher<TItem> = (url) =>
      this.get(url, decodePage, { headers: options.headers, cacheTtlMs: options.cacheTtlMs, operation: options.operation });

    return new PagingRestAction(this.client, producerOf(() => first.complete()), fetchPage, {
      operation: options.operation ?? `GET ${path}`,
    });
  }
}
