/**
 * Route stubbed `fetch` calls to in-process stand-ins
 */

import { vi } from "vitest";

import type { FakeRegistry } from "./registry.js";

type FetchInput = string | URL | Request;

export interface FetchRoutes {
  registry?: FakeRegistry;
  /** Language vocabulary served as a `[{url}]` list */
  vocabulary?: { url: string; uris: string[] };
  /** Exact URL -> XML body */
  xmlPages?: ReadonlyMap<string, string>;
}

export function stubFetch(routes: FetchRoutes) {
  const fetchMock = vi.fn(
    (input: FetchInput, init?: RequestInit): Promise<Response> => {
      const url = new URL(input instanceof Request ? input.url : input.toString());

      if (routes.registry?.handles(url) === true) {
        return routes.registry.handle(input, init);
      }
      if (routes.vocabulary !== undefined && url.href === routes.vocabulary.url) {
        const body = routes.vocabulary.uris.map((uri) => ({ url: uri }));
        return Promise.resolve(new Response(JSON.stringify(body), { status: 200 }));
      }
      const page = routes.xmlPages?.get(url.href);
      if (page !== undefined) {
        return Promise.resolve(
          new Response(page, {
            status: 200,
            headers: { "Content-Type": "text/xml" },
          })
        );
      }
      return Promise.resolve(new Response("Not found", { status: 404 }));
    }
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function requestedUrls(fetchMock: ReturnType<typeof stubFetch>): string[] {
  return fetchMock.mock.calls.map(([input]) => input.toString());
}
