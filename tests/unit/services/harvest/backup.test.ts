import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  backupFileName,
  writeBackup,
} from "../../../../src/services/harvest/backup.js";

describe("services/harvest/backup", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "harvest-backup-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe("backupFileName", () => {
    it("should replace characters unsafe in file names", () => {
      expect(backupFileName("urn:nbn:fi:lb-2019052201")).toBe(
        "urn_nbn_fi_lb-2019052201.xml"
      );
      expect(backupFileName("oai:example/a b")).toBe("oai_example_a_b.xml");
    });
  });

  describe("writeBackup", () => {
    it("should create the directory and write the XML", async () => {
      const target = join(directory, "nested");

      const path = await writeBackup(target, "urn:nbn:fi:lb-1", "<record/>");

      expect(path).toBe(join(target, "urn_nbn_fi_lb-1.xml"));
      expect(await readFile(path, "utf8")).toBe("<record/>");
    });

    it("should overwrite an earlier backup of the same record", async () => {
      await writeBackup(directory, "urn:nbn:fi:lb-1", "<old/>");
      const path = await writeBackup(directory, "urn:nbn:fi:lb-1", "<new/>");

      expect(await readFile(path, "utf8")).toBe("<new/>");
    });
  });
});
