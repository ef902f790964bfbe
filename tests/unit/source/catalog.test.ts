import { describe, it, expect } from "vitest";

import { RecordParsingError } from "../../../src/errors.js";
import { CMDI_DIALECT } from "../../../src/services/mapping/dialects.js";
import { RecordMapper } from "../../../src/services/mapping/record-mapper.js";
import { SourceCatalogClient } from "../../../src/source/catalog.js";
import {
  CMDI_PID,
  FINNISH_URI,
  readRecordXml,
  seededVocabulary,
} from "../../fixtures/records.js";
import { StaticRecordSource, collect } from "../../mocks/source.js";

const UNTYPED_RECORD = readRecordXml("cmdi-lexicon", (xml) =>
  xml
    .replace("<cmd:resourceType>lexicalConceptualResource</cmd:resourceType>", "")
    .replace("lb-2020010101</identifier>", "untyped</identifier>")
);

async function catalogFor(records: string[]): Promise<{
  catalog: SourceCatalogClient;
  source: StaticRecordSource;
}> {
  const { vocabulary } = await seededVocabulary([FINNISH_URI]);
  const mapper = new RecordMapper({
    dialect: CMDI_DIALECT,
    catalogId: "urn:catalog:test",
    vocabulary,
  });
  const source = new StaticRecordSource(records);
  const catalog = new SourceCatalogClient(source, mapper, {
    metadataPrefix: "cmdi",
    set: "FIN-CLARIN",
  });
  return { catalog, source };
}

describe("source/catalog", () => {
  describe("corpora", () => {
    it("should skip records of another resource type", async () => {
      const { catalog, source } = await catalogFor([
        readRecordXml("cmdi-lexicon"),
        readRecordXml("cmdi-corpus"),
      ]);

      const records = await collect(catalog.corpora("2024-01-01T00:00:00Z"));

      expect(records.map((record) => record.headerIdentifier)).toEqual([
        "oai:clarin.example:lb-2019052201",
      ]);
      expect(source.calls).toEqual([
        { metadataPrefix: "cmdi", set: "FIN-CLARIN", from: "2024-01-01T00:00:00Z" },
      ]);
    });

    it("should pass on records without a resource type", async () => {
      const { catalog } = await catalogFor([UNTYPED_RECORD]);

      const records = await collect(catalog.corpora());

      expect(records.map((record) => record.headerIdentifier)).toEqual([
        "oai:clarin.example:untyped",
      ]);
    });
  });

  describe("corpusPids", () => {
    it("should list the PIDs of corpora only", async () => {
      const { catalog, source } = await catalogFor([
        readRecordXml("cmdi-corpus"),
        readRecordXml("cmdi-lexicon"),
      ]);

      expect(await catalog.allIdentifiers()).toEqual(new Set([CMDI_PID]));
      expect(source.calls).toEqual([{ metadataPrefix: "cmdi", set: "FIN-CLARIN" }]);
    });

    it("should throw on a record whose resource type is unknown", async () => {
      const { catalog } = await catalogFor([
        readRecordXml("cmdi-corpus"),
        UNTYPED_RECORD,
      ]);

      await expect(catalog.allIdentifiers()).rejects.toThrow(RecordParsingError);
      await expect(catalog.allIdentifiers()).rejects.toThrow(
        "Could not determine resource type"
      );
    });
  });
});
