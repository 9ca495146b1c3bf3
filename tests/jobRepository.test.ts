import { QueryResult, QueryResultRow } from "pg";
import { StoreFailure } from "../src/errors";
import { PgJobStore, Queryable } from "../src/repositories/jobRepository";
import { QUESTION, sampleLlm, sampleVisualization, sampleWeb } from "./support/fixtures";

interface RecordedQuery {
  text: string;
  values?: unknown[];
}

function emptyResult(): QueryResult<never> {
  return { rows: [], command: "SELECT", rowCount: 0, oid: 0, fields: [] };
}

/** Records statements and answers every one with no rows. */
function recordingDb() {
  const calls: RecordedQuery[] = [];
  const db: Queryable = {
    async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
      calls.push({ text, values });
      return emptyResult();
    },
  };
  return { db, calls };
}

describe("PgJobStore", () => {
  const fixedNow = new Date("2026-03-01T12:00:00.000Z");

  test("should return null when no row matches", async () => {
    const { db } = recordingDb();
    const store = new PgJobStore(db, () => fixedNow);

    expect(await store.get("0b7a3c1e-1111-4222-8333-444455556666")).toBeNull();
    expect(await store.findFreshByFingerprint("abc", 1000)).toBeNull();
    expect(await store.listRecent(5)).toEqual([]);
  });

  test("should guard status updates on the expected status", async () => {
    const { db, calls } = recordingDb();
    const store = new PgJobStore(db, () => fixedNow);

    const result = await store.updateStatus("job-1", "QUEUED", {
      status: "PROCESSING",
      progress: 10,
      currentStep: "Collecting",
    });

    expect(result).toBeNull();
    expect(calls[0].text).toContain("WHERE id = $1 AND status = $2");
    expect(calls[0].values).toEqual(["job-1", "QUEUED", "PROCESSING", 10, "Collecting", null, fixedNow]);
  });

  test("should pass the error message only for ERROR updates", async () => {
    const { db, calls } = recordingDb();
    const store = new PgJobStore(db, () => fixedNow);

    await store.updateStatus("job-1", "SCRAPING", {
      status: "ERROR",
      progress: 30,
      currentStep: null,
      errorMessage: "Process stage failed: boom",
    });

    expect(calls[0].values?.[5]).toBe("Process stage failed: boom");
  });

  test("should insert cache copies as COMPLETE in a single statement", async () => {
    const { db, calls } = recordingDb();
    const store = new PgJobStore(db, () => fixedNow);
    const payload = {
      research_question: QUESTION,
      completed_at: "2026-03-01T12:00:00.000Z",
      web_results: sampleWeb,
      llm_response: sampleLlm,
      visualization: sampleVisualization,
    };

    await expect(
      store.createCompleted({ question: QUESTION, fingerprint: "abc", cachedFrom: "job-0", payload }),
    ).rejects.toThrow("Job store createCompleted failed: insert returned no row");

    expect(calls).toHaveLength(1);
    expect(calls[0].text).toContain("'COMPLETE', 100");
    expect(calls[0].values).toEqual([QUESTION, "abc", "job-0", payload, fixedNow]);
  });

  test("should compute the freshness cutoff from the TTL", async () => {
    const { db, calls } = recordingDb();
    const store = new PgJobStore(db, () => fixedNow);

    await store.findFreshByFingerprint("abc", 60_000);

    expect(calls[0].text).toContain("cached_from IS NULL");
    expect(calls[0].values).toEqual(["abc", new Date("2026-03-01T11:59:00.000Z")]);
  });

  test("should wrap driver errors with the failed operation", async () => {
    const db: Queryable = {
      async query() {
        throw new Error("connection refused");
      },
    };
    const store = new PgJobStore(db, () => fixedNow);

    await expect(store.get("job-1")).rejects.toThrow(StoreFailure);
    await expect(store.listRecent(1)).rejects.toThrow("Job store listRecent failed: connection refused");
  });
});
