import { describe, it, expect } from "vitest";

import { HttpRequestError, OaiPmhError } from "../../../src/errors.js";
import { OaiPmhClient } from "../../../src/source/oai-pmh.js";
import { requestedUrls, stubFetch } from "../../mocks/http.js";
import { listRecordsPage, oaiErrorPage } from "../../mocks/oai.js";
import { collect } from "../../mocks/source.js";

const BASE_URL = "https://source.test/oai";
const FIRST_PAGE = `${BASE_URL}?verb=ListRecords&metadataPrefix=cmdi&set=FIN-CLARIN`;
const SECOND_PAGE = `${BASE_URL}?verb=ListRecords&resumptionToken=page-2`;

const PARAMS = { metadataPrefix: "cmdi", set: "FIN-CLARIN" };

describe("source/oai-pmh", () => {
  describe("listRecordsUrl", () => {
    const client = new OaiPmhClient(BASE_URL);

    it("should encode the from timestamp", () => {
      expect(client.listRecordsUrl({ ...PARAMS, from: "2024-01-01T00:00:00Z" })).toBe(
        `${FIRST_PAGE}&from=2024-01-01T00%3A00%3A00Z`
      );
    });

    it("should leave out the set when there is none", () => {
      expect(client.listRecordsUrl({ metadataPrefix: "cmdi", set: null })).toBe(
        `${BASE_URL}?verb=ListRecords&metadataPrefix=cmdi`
      );
    });

    it("should send only the token when resuming", () => {
      expect(client.resumptionUrl("page-2")).toBe(SECOND_PAGE);
    });
  });

  describe("listRecords", () => {
    it("should follow resumption tokens until the token is empty", async () => {
      const fetchMock = stubFetch({
        xmlPages: new Map([
          [FIRST_PAGE, listRecordsPage([{ identifier: "oai:a" }, { identifier: "oai:b" }], "page-2")],
          [SECOND_PAGE, listRecordsPage([{ identifier: "oai:c" }])],
        ]),
      });

      const records = await collect(new OaiPmhClient(BASE_URL).listRecords(PARAMS));

      expect(records.map((record) => record.headerIdentifier)).toEqual([
        "oai:a",
        "oai:b",
        "oai:c",
      ]);
      expect(records[0]?.element.localName).toBe("record");
      expect(requestedUrls(fetchMock)).toEqual([FIRST_PAGE, SECOND_PAGE]);
    });

    it("should skip deleted records", async () => {
      stubFetch({
        xmlPages: new Map([
          [
            FIRST_PAGE,
            listRecordsPage([
              { identifier: "oai:gone", deleted: true },
              { identifier: "oai:kept" },
            ]),
          ],
        ]),
      });

      const records = await collect(new OaiPmhClient(BASE_URL).listRecords(PARAMS));
      expect(records.map((record) => record.headerIdentifier)).toEqual(["oai:kept"]);
    });

    it("should yield nothing for noRecordsMatch", async () => {
      stubFetch({
        xmlPages: new Map([[FIRST_PAGE, oaiErrorPage("noRecordsMatch", "Nothing new")]]),
      });

      await expect(collect(new OaiPmhClient(BASE_URL).listRecords(PARAMS))).resolves.toEqual(
        []
      );
    });

    it("should throw other OAI-PMH errors", async () => {
      stubFetch({
        xmlPages: new Map([
          [FIRST_PAGE, oaiErrorPage("badArgument", "Unknown set")],
        ]),
      });

      const listing = collect(new OaiPmhClient(BASE_URL).listRecords(PARAMS));
      await expect(listing).rejects.toThrow(OaiPmhError);
      await expect(listing).rejects.toThrow("OAI-PMH error badArgument: Unknown set");
    });

    it("should reject a response without ListRecords", async () => {
      stubFetch({
        xmlPages: new Map([[FIRST_PAGE, "<OAI-PMH><Identify/></OAI-PMH>"]]),
      });

      await expect(
        collect(new OaiPmhClient(BASE_URL).listRecords(PARAMS))
      ).rejects.toMatchObject({ oaiCode: "badResponse" });
    });

    it("should propagate HTTP failures", async () => {
      stubFetch({});

      await expect(
        collect(new OaiPmhClient(BASE_URL).listRecords(PARAMS))
      ).rejects.toMatchObject({
        name: "HttpRequestError",
        status: 404,
        url: FIRST_PAGE,
      });
      await expect(
        collect(new OaiPmhClient(BASE_URL).listRecords(PARAMS))
      ).rejects.toBeInstanceOf(HttpRequestError);
    });
  });
});
