/**
 * SourceCatalogClient - corpus records of the source catalog
 */

import { sourceLogger } from "../logger.js";
import { CORPUS_RESOURCE_TYPE } from "../services/mapping/dialects.js";

import type { RecordMapper } from "../services/mapping/record-mapper.js";
import type { HarvestedRecord, RecordSource } from "./oai-pmh.js";

export interface SourceCatalogOptions {
  metadataPrefix: string;
  set: string | null;
}

export class SourceCatalogClient {
  constructor(
    private readonly source: RecordSource,
    private readonly mapper: RecordMapper,
    private readonly options: SourceCatalogOptions
  ) {}

  /**
   * Records new or changed since `from` (all records when `from` is null)
   * that are, or may be, corpora.
   *
   * Records of another resource type are skipped. Records with no resource
   * type at all are passed on so that mapping reports them.
   */
  async *corpora(from: string | null = null): AsyncGenerator<HarvestedRecord> {
    let skipped = 0;
    for await (const record of this.source.listRecords({
      metadataPrefix: this.options.metadataPrefix,
      set: this.options.set,
      from,
    })) {
      const resourceType = this.mapper.findResourceType(record.element);
      if (resourceType !== undefined && resourceType !== CORPUS_RESOURCE_TYPE) {
        skipped++;
        continue;
      }
      yield record;
    }
    sourceLogger.debug({ skipped }, "Skipped non-corpus records");
  }

  /**
   * PIDs of every corpus in the source.
   *
   * Throws RecordParsingError on the first record whose resource type or PID
   * cannot be determined.
   */
  async *corpusPids(): AsyncGenerator<string> {
    for await (const record of this.source.listRecords({
      metadataPrefix: this.options.metadataPrefix,
      set: this.options.set,
    })) {
      if (this.mapper.isCorpus(record.element)) {
        yield this.mapper.pid(record.element);
      }
    }
  }

  async allIdentifiers(): Promise<Set<string>> {
    const pids = new Set<string>();
    for await (const pid of this.corpusPids()) {
      pids.add(pid);
    }
    return pids;
  }
}
