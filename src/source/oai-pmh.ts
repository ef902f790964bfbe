/**
 * OAI-PMH ListRecords transport
 */

import { OaiPmhError } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { sendRequest } from "../utils/http.js";
import { parseXml, type XmlElement } from "../utils/xml.js";

// ============================================================================
// Types
// ============================================================================

export interface ListRecordsParams {
  metadataPrefix: string;
  set: string | null;
  /** Only records created or changed at or after this timestamp */
  from?: string | null;
}

export interface HarvestedRecord {
  /** The OAI `<record>` element: header plus metadata */
  element: XmlElement;
  headerIdentifier: string | undefined;
}

/**
 * Anything that can list raw records; the harvester depends on this only
 */
export interface RecordSource {
  listRecords(params: ListRecordsParams): AsyncIterable<HarvestedRecord>;
}

const NO_RECORDS_MATCH = "noRecordsMatch";

// ============================================================================
// Client
// ============================================================================

export class OaiPmhClient implements RecordSource {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30_000
  ) {}

  /**
   * Build the first ListRecords request URL
   */
  listRecordsUrl(params: ListRecordsParams): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set("verb", "ListRecords");
    url.searchParams.set("metadataPrefix", params.metadataPrefix);
    if (params.set !== null) {
      url.searchParams.set("set", params.set);
    }
    if (params.from !== undefined && params.from !== null) {
      url.searchParams.set("from", params.from);
    }
    return url.toString();
  }

  resumptionUrl(token: string): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set("verb", "ListRecords");
    url.searchParams.set("resumptionToken", token);
    return url.toString();
  }

  /**
   * Yield every non-deleted record, following resumption tokens.
   *
   * `noRecordsMatch` ends the listing without error; any other OAI error is
   * thrown as OaiPmhError.
   */
  async *listRecords(params: ListRecordsParams): AsyncGenerator<HarvestedRecord> {
    let url: string | undefined = this.listRecordsUrl(params);
    let page = 0;

    while (url !== undefined) {
      page++;
      sourceLogger.info({ url, page }, "Fetching ListRecords page");
      const response = await sendRequest(sourceLogger, {
        url,
        timeoutMs: this.timeoutMs,
      });
      const root = parseXml(response.text);

      const error = root.find("error");
      if (error !== undefined) {
        const code = error.attribute("code") ?? "unknown";
        if (code === NO_RECORDS_MATCH) {
          sourceLogger.info({ from: params.from }, "No matching records");
          return;
        }
        throw new OaiPmhError(
          `OAI-PMH error ${code}: ${error.text.trim()}`,
          code
        );
      }

      const listRecords = root.find("ListRecords");
      if (listRecords === undefined) {
        throw new OaiPmhError(
          "OAI-PMH response has no ListRecords element",
          "badResponse"
        );
      }

      for (const record of listRecords.findAll("record")) {
        const header = record.find("header");
        if (header?.attribute("status") === "deleted") {
          continue;
        }
        yield {
          element: record,
          headerIdentifier: header?.findText("identifier"),
        };
      }

      const token = listRecords.findText("resumptionToken");
      url = token === undefined ? undefined : this.resumptionUrl(token);
    }
  }
}
