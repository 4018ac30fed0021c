import type { PagedAsyncIterableIterator } from "@azure/core-paging";

export function pagedOf<T>(items: T[]): PagedAsyncIterableIterator<T> {
  const iterator = (async function* () {
    yield* items;
  })();

  const paged: PagedAsyncIterableIterator<T> = {
    next: () => iterator.next(),
    [Symbol.asyncIterator]: () => paged,
    byPage: () =>
      (async function* () {
        yield items;
      })(),
  };

  return paged;
}

export function pagedFailure<T>(error: Error): PagedAsyncIterableIterator<T> {
  const paged: PagedAsyncIterableIterator<T> = {
    next: () => Promise.reject(error),
    [Symbol.asyncIterator]: () => paged,
    byPage: () =>
      (async function* () {
        throw error;
      })(),
  };

  return paged;
}

export function resourceIdOf(subscriptionId: string, groupName: string, resourceType: string, ...names: string[]): string {
  return [`/subscriptions/${subscriptionId}/resourceGroups/${groupName}/providers/${resourceType}`, ...names].join("/");
}
