/**
 * Controlled vocabulary of language URIs accepted by the registry.
 *
 * The full vocabulary is fetched once per endpoint and kept in a
 * VocabularyCache owned by whoever composes the mapper.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { RegistryResponseError } from "../../errors.js";
import { vocabularyLogger } from "../../logger.js";
import { parseJsonBody, sendRequest } from "../../utils/http.js";

// ============================================================================
// Response Shapes
// ============================================================================

/** Search-index listing: `{hits: {hits: [{_source: {uri}}]}}` */
const SearchIndexResponseSchema = Type.Object({
  hits: Type.Object({
    hits: Type.Array(
      Type.Object({ _source: Type.Object({ uri: Type.String() }) })
    ),
  }),
});

/** Reference-data listing: `[{url}]` */
const ReferenceListResponseSchema = Type.Array(
  Type.Object({ url: Type.String() })
);

/**
 * Extract the allowed URIs from a vocabulary response body
 */
export function parseVocabulary(body: unknown, url: string): Set<string> {
  if (Value.Check(SearchIndexResponseSchema, body)) {
    return new Set(body.hits.hits.map((hit) => hit._source.uri));
  }
  if (Value.Check(ReferenceListResponseSchema, body)) {
    return new Set(body.map((entry) => entry.url));
  }
  throw new RegistryResponseError(
    "Language vocabulary response has an unexpected shape",
    url
  );
}

// ============================================================================
// Cache
// ============================================================================

export type VocabularyFetcher = (endpoint: string) => Promise<ReadonlySet<string>>;

/**
 * Memoizes one vocabulary per endpoint. A failed fetch is not cached.
 */
export class VocabularyCache {
  private readonly entries = new Map<string, Promise<ReadonlySet<string>>>();

  getOrFetch(
    endpoint: string,
    fetcher: VocabularyFetcher
  ): Promise<ReadonlySet<string>> {
    const cached = this.entries.get(endpoint);
    if (cached !== undefined) {
      return cached;
    }

    const pending = fetcher(endpoint).catch((error: unknown) => {
      this.entries.delete(endpoint);
      throw error;
    });
    this.entries.set(endpoint, pending);
    return pending;
  }

  /** Forget one endpoint, or every endpoint when none is given */
  invalidate(endpoint?: string): void {
    if (endpoint === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(endpoint);
    }
  }

  has(endpoint: string): boolean {
    return this.entries.has(endpoint);
  }
}

// ============================================================================
// Vocabulary
// ============================================================================

export class LanguageVocabulary {
  constructor(
    private readonly endpoint: string,
    private readonly cache: VocabularyCache,
    private readonly timeoutMs = 30_000
  ) {}

  /**
   * Whether the URI is listed in the vocabulary. Fetch failures propagate.
   */
  async isAllowed(uri: string): Promise<boolean> {
    const allowed = await this.cache.getOrFetch(this.endpoint, (endpoint) =>
      this.fetchVocabulary(endpoint)
    );
    return allowed.has(uri);
  }

  private async fetchVocabulary(endpoint: string): Promise<ReadonlySet<string>> {
    vocabularyLogger.info({ url: endpoint }, "Fetching language vocabulary");
    const response = await sendRequest(vocabularyLogger, {
      url: endpoint,
      timeoutMs: this.timeoutMs,
    });
    const uris = parseVocabulary(parseJsonBody(response.text), endpoint);
    vocabularyLogger.debug(
      { url: endpoint, count: uris.size },
      "Language vocabulary loaded"
    );
    return uris;
  }
}
