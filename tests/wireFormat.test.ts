import { PaperRecord, toWirePaper } from "../src/core/entities/Paper.js";
import { createSearchJob, jobIdOf, isTerminal, snapshotOf, toWireSnapshot } from "../src/core/entities/SearchJob.js";

const record: PaperRecord = {
  title: "A Placeholder Study",
  authors: ["Ada Placeholder"],
  year: 2020,
  publicationDate: "2020-05-01",
  sourceUrl: "https://scholar.example.org/item/a1",
  artifactUrl: "https://files.example.org/a1.pdf",
  citationCount: 3,
  venue: "Journal of Examples",
  venueType: "Journal",
  summary: null,
};

describe("Wire format", () => {
  test("should build job ids from client and search ids", () => {
    expect(jobIdOf("client-1", "search-9")).toBe("client-1_search-9");
  });

  test("should treat only completed and error as terminal", () => {
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("error")).toBe(true);
    expect(isTerminal("searching_papers")).toBe(false);
    expect(isTerminal("pending")).toBe(false);
  });

  test("should serialize a paper record with snake_case keys", () => {
    expect(toWirePaper(record)).toEqual({
      title: "A Placeholder Study",
      authors: ["Ada Placeholder"],
      year: 2020,
      publication_date: "2020-05-01",
      source_url: "https://scholar.example.org/item/a1",
      artifact_url: "https://files.example.org/a1.pdf",
      citation_count: 3,
      venue: "Journal of Examples",
      venue_type: "Journal",
      summary: null,
    });
  });

  test("should serialize a snapshot with ISO timestamps", () => {
    const job = createSearchJob("https://scholar.example.org/profile/ada", "client-1", "search-1");
    job.startTime = new Date("2024-01-02T03:04:05.000Z");
    job.completedTime = new Date("2024-01-02T03:10:00.000Z");
    job.status = "completed";
    job.progress = 100;
    job.subjectName = "Ada Placeholder";
    job.itemUrls = [record.sourceUrl];
    job.items = [record];
    job.fetchedCount = 1;
    job.totalCount = 1;
    job.workerId = "worker-2";

    expect(toWireSnapshot(snapshotOf(job))).toEqual({
      job_id: "client-1_search-1",
      client_id: "client-1",
      search_id: "search-1",
      source_url: "https://scholar.example.org/profile/ada",
      subject_name: "Ada Placeholder",
      status: "completed",
      progress: 100,
      fetched_count: 1,
      total_count: 1,
      skipped_count: 0,
      item_urls: ["https://scholar.example.org/item/a1"],
      items: [toWirePaper(record)],
      error_message: null,
      start_time: "2024-01-02T03:04:05.000Z",
      completed_time: "2024-01-02T03:10:00.000Z",
      worker_id: "worker-2",
    });
  });

  test("should take snapshots that ignore later changes to the job", () => {
    const job = createSearchJob("https://scholar.example.org/profile/ada", "client-1", "search-1");
    const snapshot = snapshotOf(job);

    job.items.push(record);
    job.itemUrls.push(record.sourceUrl);
    job.status = "searching_papers";
    job.startTime.setFullYear(2000);

    expect(snapshot.items).toHaveLength(0);
    expect(snapshot.itemUrls).toHaveLength(0);
    expect(snapshot.status).toBe("pending");
    expect(snapshot.startTime.getFullYear()).not.toBe(2000);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});
