import { describe, it, expect, vi } from "vitest";

import { HttpRequestError, RegistryResponseError } from "../../../../src/errors.js";
import {
  LanguageVocabulary,
  VocabularyCache,
  parseVocabulary,
} from "../../../../src/services/mapping/language-vocabulary.js";
import { FINNISH_URI, VOCABULARY_URL } from "../../../fixtures/records.js";
import { stubFetch } from "../../../mocks/http.js";

const SWEDISH_URI = "http://lexvo.org/id/iso639-3/swe";

describe("services/mapping/language-vocabulary", () => {
  describe("parseVocabulary", () => {
    it("should read a search-index response", () => {
      const body = {
        hits: { hits: [{ _source: { uri: FINNISH_URI } }, { _source: { uri: SWEDISH_URI } }] },
      };
      expect(parseVocabulary(body, VOCABULARY_URL)).toEqual(
        new Set([FINNISH_URI, SWEDISH_URI])
      );
    });

    it("should read a reference-data list", () => {
      expect(parseVocabulary([{ url: FINNISH_URI }], VOCABULARY_URL)).toEqual(
        new Set([FINNISH_URI])
      );
    });

    it("should reject any other shape", () => {
      expect(() => parseVocabulary({ results: [] }, VOCABULARY_URL)).toThrow(
        RegistryResponseError
      );
    });
  });

  describe("VocabularyCache", () => {
    it("should fetch each endpoint once", async () => {
      const cache = new VocabularyCache();
      const fetcher = vi.fn(() => Promise.resolve(new Set([FINNISH_URI])));

      await cache.getOrFetch(VOCABULARY_URL, fetcher);
      await cache.getOrFetch(VOCABULARY_URL, fetcher);

      expect(fetcher).toHaveBeenCalledTimes(1);
      expect(cache.has(VOCABULARY_URL)).toBe(true);
    });

    it("should fetch again after invalidation", async () => {
      const cache = new VocabularyCache();
      const fetcher = vi.fn(() => Promise.resolve(new Set([FINNISH_URI])));

      await cache.getOrFetch(VOCABULARY_URL, fetcher);
      cache.invalidate();
      expect(cache.has(VOCABULARY_URL)).toBe(false);
      await cache.getOrFetch(VOCABULARY_URL, fetcher);

      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it("should not keep a failed fetch", async () => {
      const cache = new VocabularyCache();
      const failing = vi.fn(() => Promise.reject(new Error("unavailable")));

      await expect(cache.getOrFetch(VOCABULARY_URL, failing)).rejects.toThrow(
        "unavailable"
      );
      expect(cache.has(VOCABULARY_URL)).toBe(false);
    });
  });

  describe("LanguageVocabulary", () => {
    it("should answer membership from one fetch", async () => {
      const fetchMock = stubFetch({
        vocabulary: { url: VOCABULARY_URL, uris: [FINNISH_URI] },
      });
      const vocabulary = new LanguageVocabulary(VOCABULARY_URL, new VocabularyCache());

      expect(await vocabulary.isAllowed(FINNISH_URI)).toBe(true);
      expect(await vocabulary.isAllowed(SWEDISH_URI)).toBe(false);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("should propagate fetch failures", async () => {
      stubFetch({});
      const vocabulary = new LanguageVocabulary(VOCABULARY_URL, new VocabularyCache());

      await expect(vocabulary.isAllowed(FINNISH_URI)).rejects.toThrow(
        HttpRequestError
      );
    });
  });
});
