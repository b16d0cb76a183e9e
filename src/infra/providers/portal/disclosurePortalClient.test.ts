import { describe, expect, it } from "vitest";
import {
  PermanentFetchError,
  TransientFetchError,
} from "../../../core/entities/appError";
import { HttpClient } from "../../http/httpClient";
import { RateLimiter } from "../../http/rateLimiter";
import {
  DisclosurePortalClient,
  type DisclosurePortalClientExtras,
} from "./disclosurePortalClient";

const header =
  "Issuer Number,Issuer Name,Document GUID,Filing Type,Document Type,Date Filed,Generate URL,Size,Amendment";

type CapturedRequest = { url: string; method?: string; body?: unknown };

const createClient = (
  respond: (request: CapturedRequest) => Response,
  pageSize = 2,
  extras: DisclosurePortalClientExtras = {},
) => {
  const requests: CapturedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const request: CapturedRequest = {
      url: String(input),
      method: init?.method,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);
    return respond(request);
  };

  const httpClient = new HttpClient(
    { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
    new RateLimiter({ minIntervalMs: 0, maxConcurrent: 1 }),
    { fetchImpl, sleep: async () => {} },
  );

  const client = new DisclosurePortalClient(
    {
      baseUrl: "https://portal.test",
      exportPath: "/csa-party/service/exportCsv",
      documentPath: "/csa-party/records/document.html",
      userAgent: "disclosure-sync-test/1.0",
      timeoutMs: 1_000,
      downloadTimeoutMs: 1_000,
      pageSize,
    },
    httpClient,
    extras,
  );

  return { client, requests };
};

const window = { start: "2024-01-01", end: "2024-01-02" };

describe("DisclosurePortalClient", () => {
  it("maps export rows to observations and pages by row offset", async () => {
    const csv = [
      header,
      '000123,Acme Mining Corp.,GUID-1,Annual financial statements,Audited annual financial statements,2024-01-02,https://portal.test/docs/GUID-1,"1,024",N',
      "000456,,GUID-2,Material change report,Material change report,2024-01-01 16:04,,,Y",
    ].join("\n");
    const { client, requests } = createClient(
      () => new Response(csv, { status: 200 }),
    );

    const page = await client.search(window, null);
    if (page.isErr()) {
      throw page.error;
    }

    expect(requests[0]).toEqual({
      url: "https://portal.test/csa-party/service/exportCsv",
      method: "POST",
      body: {
        service: "searchDocuments",
        queryArgs: {
          _locale: "en",
          fromDate: "2024-01-01",
          toDate: "2024-01-02",
          start: 1,
          pageSize: 2,
        },
      },
    });
    expect(page.value.nextPageToken).toBe("3");
    expect(page.value.rejectedRows).toBe(0);
    expect(page.value.records).toHaveLength(2);
    expect(page.value.records[0]).toMatchObject({
      documentIdentity: "GUID-1",
      issuerId: "000123",
      filingType: "Annual financial statements",
      documentType: "Audited annual financial statements",
      filedOn: "2024-01-02",
      sourceUrl: "https://portal.test/docs/GUID-1",
      sizeBytes: 1_024,
      amendmentMarker: false,
      issuer: { name: "Acme Mining Corp." },
    });
    expect(page.value.records[1]).toMatchObject({
      documentIdentity: "GUID-2",
      filedOn: "2024-01-01",
      sourceUrl: undefined,
      sizeBytes: undefined,
      amendmentMarker: true,
      issuer: undefined,
    });
  });

  it("ends pagination on a short page and counts rejected rows", async () => {
    const csv = [
      header,
      "000123,Acme Mining Corp.,GUID-7,Annual information form,Annual information form,2024-01-02,,,N",
      "000123,Acme Mining Corp.,,Annual information form,Annual information form,2024-01-02,,,N",
    ].join("\n");
    const { client, requests } = createClient(
      () => new Response(csv, { status: 200 }),
      5,
    );

    const page = await client.search(window, "11");
    if (page.isErr()) {
      throw page.error;
    }

    expect(requests[0]?.body).toMatchObject({ queryArgs: { start: 11 } });
    expect(page.value.nextPageToken).toBeNull();
    expect(page.value.records.map((record) => record.documentIdentity)).toEqual([
      "GUID-7",
    ]);
    expect(page.value.rejectedRows).toBe(1);
  });

  it("rejects a malformed page token without calling the portal", async () => {
    const { client, requests } = createClient(
      () => new Response("", { status: 200 }),
    );

    const page = await client.search(window, "next-please");

    expect(page.isErr()).toBe(true);
    expect(page.isErr() ? page.error : null).toBeInstanceOf(PermanentFetchError);
    expect(requests).toHaveLength(0);
  });

  it("surfaces exhausted 5xx retries as transient fetch errors", async () => {
    const { client, requests } = createClient(
      () => new Response("busy", { status: 503 }),
    );

    const page = await client.search(window, null);
    if (page.isOk()) {
      throw new Error("expected failure");
    }

    expect(page.error).toBeInstanceOf(TransientFetchError);
    expect(page.error).toMatchObject({
      operation: "search",
      attempts: 2,
      lastStatus: 503,
    });
    expect(requests).toHaveLength(2);
  });

  it.each([408, 422, 425])(
    "fails immediately on client error %i",
    async (status) => {
      const { client, requests } = createClient(
        () => new Response("no", { status }),
      );

      const page = await client.search(window, null);
      if (page.isOk()) {
        throw new Error("expected failure");
      }

      expect(page.error).toBeInstanceOf(PermanentFetchError);
      expect(page.error).toMatchObject({ operation: "search", status });
      expect(requests).toHaveLength(1);
    },
  );

  it("caches each raw export under a window, page or date name", async () => {
    const saved = new Map<string, string>();
    const csv = `${header}\n000123,Acme Mining Corp.,GUID-1,Annual information form,Annual information form,2024-01-02,,,N`;
    const { client } = createClient(() => new Response(csv, { status: 200 }), 5, {
      exportCache: {
        save: async (fileName, body) => {
          saved.set(fileName, body);
        },
      },
      clock: { now: () => new Date("2024-01-02T12:00:00.000Z") },
    });

    await client.search(window, "6");
    await client.fetchIssuers();

    expect([...saved.keys()]).toEqual([
      "filings_2024-01-01_2024-01-02_p6.csv",
      "issuers_20240102.csv",
    ]);
    expect(saved.get("filings_2024-01-01_2024-01-02_p6.csv")).toBe(csv);
  });

  it("still returns the page when the export cache cannot write", async () => {
    const csv = `${header}\n000123,Acme Mining Corp.,GUID-1,Annual information form,Annual information form,2024-01-02,,,N`;
    const { client } = createClient(() => new Response(csv, { status: 200 }), 5, {
      exportCache: {
        save: async () => {
          throw new Error("read-only file system");
        },
      },
    });

    const page = await client.search(window, null);

    expect(page._unsafeUnwrap().records.map((record) => record.documentIdentity)).toEqual([
      "GUID-1",
    ]);
  });

  it("flags downloaded content whose length differs from the declared size", async () => {
    const { client, requests } = createClient(
      () => new Response(new Uint8Array([37, 80, 68, 70]), { status: 200 }),
    );

    const content = await client.downloadContent({
      documentIdentity: "doc-9",
      declaredSizeBytes: 10,
    });
    if (content.isErr()) {
      throw content.error;
    }

    expect(requests[0]?.url).toBe(
      "https://portal.test/csa-party/records/document.html?id=doc-9",
    );
    expect(content.value.bytes.byteLength).toBe(4);
    expect(content.value.sizeMismatch).toBe(true);
  });

  it("parses the reporting issuer export", async () => {
    const csv = [
      "Issuer Number,Name,Jurisdiction(s),Type,In Default Flag,Active CTO Flag",
      "000123,Acme Mining Corp.,Ontario,Reporting issuer,Y,N",
      ",Nameless Holdings,Quebec,Reporting issuer,N,N",
    ].join("\n");
    const { client, requests } = createClient(
      () => new Response(csv, { status: 200 }),
    );

    const issuers = await client.fetchIssuers();
    if (issuers.isErr()) {
      throw issuers.error;
    }

    expect(requests[0]?.body).toMatchObject({ service: "reportingIssuers" });
    expect(issuers.value).toEqual([
      {
        issuerId: "000123",
        name: "Acme Mining Corp.",
        jurisdiction: "Ontario",
        type: "Reporting issuer",
        inDefault: true,
        activeRestriction: false,
      },
    ]);
  });
});
