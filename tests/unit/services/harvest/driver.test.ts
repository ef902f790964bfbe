import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, it, expect } from "vitest";

import { IN_MEMORY } from "../../../../src/db/index.js";
import { ConfigurationError } from "../../../../src/errors.js";
import {
  createHarvestContext,
  summarizeHarvest,
  type HarvestContext,
  type HarvestProgress,
} from "../../../../src/services/harvest/index.js";
import {
  CMDI_PID,
  FINNISH_URI,
  VOCABULARY_URL,
  readRecordXml,
} from "../../../fixtures/records.js";
import { stubFetch } from "../../../mocks/http.js";
import {
  CATALOG_ID,
  FakeRegistry,
  REGISTRY_BASE_URL,
  REGISTRY_TOKEN,
} from "../../../mocks/registry.js";
import { StaticRecordSource } from "../../../mocks/source.js";

import type { HarvesterConfig } from "../../../../src/config.js";

const STALE_PID = "urn:nbn:fi:lb-2000010101";
const BROKEN_HEADER_ID = "oai:clarin.example:broken";

const BROKEN_RECORD = readRecordXml("cmdi-corpus", (xml) =>
  xml
    .replace(/<cmd:MdSelfLink>.*<\/cmd:MdSelfLink>/, "")
    .replace(
      "<identifier>oai:clarin.example:lb-2019052201</identifier>",
      `<identifier>${BROKEN_HEADER_ID}</identifier>`
    )
);

function testConfig(apiToken = REGISTRY_TOKEN): HarvesterConfig {
  return {
    source: {
      url: "https://source.test/oai",
      metadataPrefix: "cmdi",
      set: "FIN-CLARIN",
      dialect: "cmdi",
    },
    registry: { baseUrl: REGISTRY_BASE_URL, apiToken, catalogId: CATALOG_ID },
    languageVocabularyUrl: VOCABULARY_URL,
    requestTimeoutMs: 1_000,
    stateDbPath: IN_MEMORY,
  };
}

interface Harness {
  context: HarvestContext;
  source: StaticRecordSource;
  registry: FakeRegistry;
  clock: { now: Date };
}

const contexts: HarvestContext[] = [];

async function createHarness(
  records: string[],
  apiToken?: string
): Promise<Harness> {
  const registry = new FakeRegistry();
  stubFetch({ registry, vocabulary: { url: VOCABULARY_URL, uris: [FINNISH_URI] } });

  const source = new StaticRecordSource(records);
  const clock = { now: new Date("2024-03-01T12:00:00.250Z") };
  const context = await createHarvestContext(testConfig(apiToken), {
    recordSource: source,
    now: () => clock.now,
  });
  contexts.push(context);
  return { context, source, registry, clock };
}

describe("services/harvest/driver", () => {
  afterEach(async () => {
    for (const context of contexts.splice(0)) {
      await context.db.destroy();
    }
  });

  it("should harvest everything first and only changes afterwards", async () => {
    const { context, source, registry, clock } = await createHarness([
      readRecordXml("cmdi-corpus"),
      readRecordXml("cmdi-lexicon"),
    ]);
    const staleId = registry.seed(STALE_PID);

    const first = await context.driver.run();

    expect(first).toEqual({
      runId: 1,
      from: null,
      harvested: 1,
      created: 1,
      updated: 0,
      faulty: [],
      backupFailures: [],
      deleted: [{ pid: STALE_PID, id: staleId }],
      deletionAborted: null,
      deletionSkipped: false,
      success: true,
    });
    expect(summarizeHarvest(first)).toBe(
      "Success, all records harvested (harvested: 1, faulty: 0)"
    );
    expect(registry.pids()).toEqual([CMDI_PID]);

    clock.now = new Date("2024-03-02T08:00:00Z");
    const second = await context.driver.run();

    expect(second.from).toBe("2024-03-01T12:00:00Z");
    expect(second.created).toBe(0);
    expect(second.updated).toBe(1);
    expect(summarizeHarvest(second)).toBe(
      "Success, records harvested since 2024-03-01T12:00:00Z (harvested: 1, faulty: 0)"
    );
    expect(source.calls.map((call) => call.from)).toEqual([
      null,
      undefined,
      "2024-03-01T12:00:00Z",
      undefined,
    ]);

    const runs = await context.state.recentRuns();
    expect(runs.map((run) => [run.status, run.started_at, run.finished_at])).toEqual([
      ["SUCCEEDED", "2024-03-02T08:00:00Z", "2024-03-02T08:00:00Z"],
      ["SUCCEEDED", "2024-03-01T12:00:00Z", "2024-03-01T12:00:00Z"],
    ]);
  });

  it("should harvest everything when asked for a full run", async () => {
    const { context, clock } = await createHarness([readRecordXml("cmdi-corpus")]);
    await context.driver.run();

    clock.now = new Date("2024-03-02T08:00:00Z");
    const report = await context.driver.run({ full: true });

    expect(report.from).toBeNull();
  });

  it("should tally faulty records and keep going", async () => {
    const { context, registry } = await createHarness([
      BROKEN_RECORD,
      readRecordXml("cmdi-corpus"),
    ]);

    const report = await context.driver.run({ skipDeletions: true });

    expect(report.faulty).toEqual([
      { identifier: BROKEN_HEADER_ID, message: "Could not determine PID" },
    ]);
    expect(report.harvested).toBe(1);
    expect(report.deletionSkipped).toBe(true);
    expect(report.success).toBe(false);
    expect(summarizeHarvest(report)).toBe(
      "Failure, not all records could be processed (harvested: 1, faulty: 1, backup failures: 0)"
    );
    expect(registry.pids()).toEqual([CMDI_PID]);

    const [run] = await context.state.recentRuns(1);
    expect(run?.status).toBe("FAILED");
    expect(run?.faulty_count).toBe(1);
    expect(await context.state.lastSuccessfulHarvest()).toBeNull();
  });

  it("should abort only the deletion pass on an unparseable source record", async () => {
    const { context, registry } = await createHarness([
      readRecordXml("cmdi-corpus"),
      BROKEN_RECORD,
    ]);
    registry.seed(STALE_PID);

    const report = await context.driver.run();

    expect(report.deletionAborted).toBe(
      `Error parsing record ${BROKEN_HEADER_ID}: Could not determine PID`
    );
    expect(report.deleted).toEqual([]);
    expect(registry.pids()).toEqual([CMDI_PID, STALE_PID].sort());
    expect(summarizeHarvest(report)).toBe(
      "Failure, not all records could be processed (harvested: 1, faulty: 1, backup failures: 0, deletion pass aborted)"
    );

    const [run] = await context.state.recentRuns(1);
    expect(run?.error).toBe(report.deletionAborted);
  });

  it("should abort the run when the registry refuses the token", async () => {
    const { context } = await createHarness([readRecordXml("cmdi-corpus")], "wrong-token");

    await expect(context.driver.run()).rejects.toBeInstanceOf(ConfigurationError);

    const [run] = await context.state.recentRuns(1);
    expect(run?.status).toBe("FAILED");
    expect(run?.error).toBe("Registry refused the API token (status 401)");
    expect(run?.finished_at).toBe("2024-03-01T12:00:00Z");
  });

  it("should back up each record under its PID", async () => {
    const directory = await mkdtemp(join(tmpdir(), "harvest-driver-"));
    try {
      const { context } = await createHarness([
        readRecordXml("cmdi-corpus"),
        BROKEN_RECORD,
      ]);

      const report = await context.driver.run({
        backupDir: directory,
        skipDeletions: true,
      });

      expect(report.backupFailures).toEqual([]);
      expect((await readdir(directory)).sort()).toEqual([
        "oai_clarin.example_broken.xml",
        "urn_nbn_fi_lb-2019052201.xml",
      ]);
      const xml = await readFile(join(directory, "urn_nbn_fi_lb-2019052201.xml"), "utf8");
      expect(xml).toContain(
        "<cmd:MdSelfLink>http://urn.fi/urn:nbn:fi:lb-2019052201</cmd:MdSelfLink>"
      );
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("should report progress for both phases", async () => {
    const { context } = await createHarness([readRecordXml("cmdi-corpus")]);
    const progress: HarvestProgress[] = [];
    context.driver.setProgressCallback((update) => progress.push(update));

    await context.driver.run();

    expect(progress).toEqual([
      { phase: "harvest", current: 1, currentItem: CMDI_PID },
      { phase: "deletion", current: 0 },
      { phase: "deletion", current: 0 },
    ]);
  });
});
