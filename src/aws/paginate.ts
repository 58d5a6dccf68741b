/**
 * Fetches one page. `nextToken` is `undefined` for the first page.
 */
export type PageFetcher<TPage> = (nextToken: string | undefined) => Promise<TPage>;

/**
 * Lazily walks a token-paginated AWS listing.
 *
 * The returned iterable is restartable: each `for await` starts again from the
 * first page and stops after the first page without a continuation token.
 *
 * @example
 * ```typescript
 * const pages = paginate(
 *   (NextToken) => client.send(new ListDomainsCommand({ NextToken })),
 *   (page) => page.NextToken,
 * );
 * for await (const page of pages) { ... }
 * ```
 */
export function paginate<TPage>(
  fetchPage: PageFetcher<TPage>,
  nextTokenOf: (page: TPage) => string | undefined,
): AsyncIterable<TPage> {
  return {
    async *[Symbol.asyncIterator]() {
      let token: string | undefined;
      do {
        const page = await fetchPage(token);
        yield page;
        token = nextTokenOf(page);
      } while (token);
    },
  };
}
