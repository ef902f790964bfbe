/**
 * RegistryClient - CRUD of canonical records in the destination registry
 *
 * Records are matched by persistent identifier within one data catalog. A PID
 * must match at most one registry record; more is reported as
 * DuplicateRecordError.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { assertHttpUrl } from "../config.js";
import {
  ConfigurationError,
  DuplicateRecordError,
  HttpRequestError,
  RegistryResponseError,
} from "../errors.js";
import { registryLogger } from "../logger.js";
import { parseJsonBody, sendRequest, type HttpRequest } from "../utils/http.js";
import {
  DatasetListResponseSchema,
  DatasetWriteResponseSchema,
} from "./schemas.js";

import type { CanonicalRecord } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface RegistryClientOptions {
  baseUrl: string;
  apiToken: string;
  catalogId: string;
  timeoutMs?: number;
}

export type SendAction = "created" | "updated";

export interface SendResult {
  action: SendAction;
  /** Registry-internal identifier */
  id: string;
}

export interface DeletedRecord {
  pid: string;
  id: string;
}

const DatasetDetailSchema = Type.Record(Type.String(), Type.Unknown());

export type DatasetDetail = Static<typeof DatasetDetailSchema>;

const PAGE_SIZE = 100;

// ============================================================================
// Client
// ============================================================================

export class RegistryClient {
  readonly catalogId: string;
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;

  constructor(options: RegistryClientOptions) {
    this.baseUrl = assertHttpUrl("REGISTRY_BASE_URL", options.baseUrl).replace(
      /\/+$/,
      ""
    );
    this.apiToken = options.apiToken;
    this.catalogId = options.catalogId;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  datasetsUrl(params: Record<string, string> = {}): string {
    const url = new URL(`${this.baseUrl}/datasets`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  datasetUrl(id: string): string {
    return `${this.baseUrl}/datasets/${encodeURIComponent(id)}`;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /**
   * Registry identifier of the record with this PID, or null when there is
   * none
   */
  async recordId(pid: string): Promise<string | null> {
    const url = this.datasetsUrl({
      data_catalog__id: this.catalogId,
      persistent_identifier: pid,
    });
    const page = this.parse(
      DatasetListResponseSchema,
      await this.request({ url }),
      url
    );

    const matches = page.results.filter(
      (dataset) => dataset.persistent_identifier === pid
    );
    if (matches.length > 1) {
      throw new DuplicateRecordError(pid, matches.length);
    }
    return matches[0]?.id ?? null;
  }

  async getRecord(id: string): Promise<DatasetDetail> {
    const url = this.datasetUrl(id);
    return this.parse(DatasetDetailSchema, await this.request({ url }), url);
  }

  /**
   * PIDs of every record in the catalog, following result pages
   */
  async allIdentifiers(): Promise<Set<string>> {
    const pids = new Set<string>();
    let url: string | undefined = this.datasetsUrl({
      data_catalog__id: this.catalogId,
      limit: String(PAGE_SIZE),
    });

    while (url !== undefined) {
      const page: Static<typeof DatasetListResponseSchema> = this.parse(
        DatasetListResponseSchema,
        await this.request({ url }),
        url
      );
      for (const dataset of page.results) {
        if (dataset.persistent_identifier !== null) {
          pids.add(dataset.persistent_identifier);
        }
      }
      url =
        page.next !== undefined && page.next !== null
          ? new URL(page.next, url).toString()
          : undefined;
    }

    registryLogger.debug(
      { catalogId: this.catalogId, count: pids.size },
      "Listed registry records"
    );
    return pids;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async create(record: CanonicalRecord): Promise<string> {
    const url = this.datasetsUrl();
    const body = this.parse(
      DatasetWriteResponseSchema,
      await this.request({ method: "POST", url, json: record }),
      url
    );
    registryLogger.info(
      { method: "POST", url, pid: record.persistent_identifier, id: body.id },
      "Created registry record"
    );
    return body.id;
  }

  async update(id: string, record: CanonicalRecord): Promise<string> {
    const url = this.datasetUrl(id);
    await this.request({ method: "PUT", url, json: record });
    registryLogger.info(
      { method: "PUT", url, pid: record.persistent_identifier, id },
      "Updated registry record"
    );
    return id;
  }

  async delete(id: string): Promise<void> {
    const url = this.datasetUrl(id);
    await this.request({ method: "DELETE", url });
    registryLogger.info({ method: "DELETE", url, id }, "Deleted registry record");
  }

  /**
   * Update the record with the same PID, or create one when there is none
   */
  async send(record: CanonicalRecord): Promise<SendResult> {
    const existingId = await this.recordId(record.persistent_identifier);
    if (existingId === null) {
      return { action: "created", id: await this.create(record) };
    }
    return { action: "updated", id: await this.update(existingId, record) };
  }

  /**
   * Delete the record with this PID; null when the registry has none
   */
  async deleteRecord(pid: string): Promise<DeletedRecord | null> {
    const id = await this.recordId(pid);
    if (id === null) {
      return null;
    }
    await this.delete(id);
    return { pid, id };
  }

  // ==========================================================================
  // Deletion Sync
  // ==========================================================================

  /**
   * Registry PIDs absent from `retained`, sorted.
   *
   * `retained` is read to the end before the registry is listed, so a failure
   * while producing it leaves the registry untouched.
   */
  async deletionCandidates(
    retained: AsyncIterable<string> | Iterable<string>
  ): Promise<string[]> {
    const retainedPids = new Set<string>();
    for await (const pid of retained) {
      retainedPids.add(pid);
    }

    const registryPids = await this.allIdentifiers();
    return [...registryPids].filter((pid) => !retainedPids.has(pid)).sort();
  }

  /**
   * Delete every registry record whose PID is absent from `retained`
   */
  async deleteRecordsNotIn(
    retained: AsyncIterable<string> | Iterable<string>
  ): Promise<DeletedRecord[]> {
    const candidates = await this.deletionCandidates(retained);
    registryLogger.info(
      { count: candidates.length },
      "Registry records to delete"
    );

    const deleted: DeletedRecord[] = [];
    for (const pid of candidates) {
      const result = await this.deleteRecord(pid);
      if (result === null) {
        registryLogger.warn({ pid }, "Record disappeared before deletion");
        continue;
      }
      deleted.push(result);
    }
    return deleted;
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async request(
    request: Omit<HttpRequest, "headers" | "timeoutMs">
  ): Promise<unknown> {
    try {
      const response = await sendRequest(registryLogger, {
        ...request,
        headers: {
          Accept: "application/json",
          Authorization: `Token ${this.apiToken}`,
        },
        timeoutMs: this.timeoutMs,
      });
      return parseJsonBody(response.text);
    } catch (error) {
      if (
        error instanceof HttpRequestError &&
        (error.status === 401 || error.status === 403)
      ) {
        throw new ConfigurationError(
          `Registry refused the API token (status ${String(error.status)})`
        );
      }
      throw error;
    }
  }

  private parse<T extends TSchema>(
    schema: T,
    body: unknown,
    url: string
  ): Static<T> {
    if (!Value.Check(schema, body)) {
      throw new RegistryResponseError(
        "Registry response has an unexpected shape",
        url
      );
    }
    return body;
  }
}
