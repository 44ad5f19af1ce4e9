import { AdminError } from "../error";
import { errorFromStatus } from "../responseToError";
import { MetadataKind, MetadataTypes, unpack } from "./metadata";
import { PageResult } from "./transport";
import { Operation } from "./types";

export type PageFetcher<T> = (pageToken?: string) => Promise<PageResult<T>>;

/**
 * One page of a listing. Page tokens stay internal.
 */
export class Page<T> {
  constructor(
    readonly values: readonly T[],
    private readonly fetcher: PageFetcher<T>,
    private readonly nextPageToken?: string,
  ) {}

  hasNextPage(): boolean {
    return !!this.nextPageToken;
  }

  /**
   * Fetches the following page, or resolves undefined on the last one.
   */
  async nextPage(): Promise<Page<T> | undefined> {
    if (!this.nextPageToken) {
      return undefined;
    }
    return fetchPage(this.fetcher, this.nextPageToken);
  }
}

async function fetchPage<T>(fetcher: PageFetcher<T>, pageToken?: string): Promise<Page<T>> {
  const res = await fetcher(pageToken);
  return new Page(res.items, fetcher, res.nextPageToken);
}

/**
 * A lazy listing: nothing is fetched until a page or an item is asked for, and every
 * iteration starts again from the first page. Items come in the order the server sends them.
 */
export class PagedList<T> implements AsyncIterable<T> {
  constructor(private readonly fetcher: PageFetcher<T>) {}

  firstPage(): Promise<Page<T>> {
    return fetchPage(this.fetcher);
  }

  async *iterateAll(): AsyncGenerator<T, void, undefined> {
    let page: Page<T> | undefined = await this.firstPage();
    while (page) {
      yield* page.values;
      page = await page.nextPage();
    }
  }

  async all(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this.iterateAll()) {
      items.push(item);
    }
    return items;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterateAll();
  }
}

/**
 * An operation as it appears in a listing. The metadata stays packed until the caller
 * says which type it expects.
 */
export class OperationEntry {
  readonly name: string;
  readonly done: boolean;
  readonly metadataType: string | undefined;
  readonly error: AdminError | undefined;

  constructor(private readonly operation: Operation) {
    this.name = operation.name;
    this.done = !!operation.done;
    this.metadataType = operation.metadata?.["@type"];
    this.error = operation.error ? errorFromStatus(operation.error) : undefined;
  }

  /**
   * @throws InvalidMetadataTypeError if the metadata is not a `kind`.
   */
  unpackMetadata<K extends MetadataKind>(kind: K): MetadataTypes[K] {
    return unpack(this.operation.metadata, kind);
  }

  /** The raw operation, as listed. */
  toJSON(): Operation {
    return this.operation;
  }
}

/**
 * ANDs a scoping filter with an optional caller filter. Neither is interpreted.
 */
export function combineFilters(scope: string, filter?: string): string {
  return filter ? `(${scope}) AND (${filter})` : scope;
}

export interface ListOptions {
  /** Server-side filter expression, forwarded as is. */
  filter?: string;
  pageSize?: number;
}
