/**
 * In-memory record source
 */

import { parseXml } from "../../src/utils/xml.js";

import type {
  HarvestedRecord,
  ListRecordsParams,
  RecordSource,
} from "../../src/source/oai-pmh.js";

export class StaticRecordSource implements RecordSource {
  readonly calls: ListRecordsParams[] = [];

  constructor(public records: string[]) {}

  async *listRecords(params: ListRecordsParams): AsyncGenerator<HarvestedRecord> {
    this.calls.push(params);
    for (const xml of this.records) {
      const element = parseXml(xml);
      yield {
        element,
        headerIdentifier: element.findText("header/identifier"),
      };
    }
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
