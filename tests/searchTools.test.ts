import { createSearchJob, snapshotOf } from "../src/core/entities/SearchJob.js";
import { formatPoolStats, formatRecent, formatSnapshot } from "../src/presentation/tools/SearchTools.js";

describe("Search tool formatting", () => {
  function runningJob() {
    const job = createSearchJob("https://scholar.example.org/profile/ada", "client-1", "search-1");
    job.status = "searching_papers";
    job.progress = 48.33;
    job.subjectName = "Ada Placeholder";
    job.fetchedCount = 1;
    job.totalCount = 3;
    job.workerId = "worker-1";
    job.items.push({
      title: "A Placeholder Study",
      authors: ["Ada Placeholder"],
      year: 2020,
      publicationDate: "2020-05-01",
      sourceUrl: "https://scholar.example.org/item/a1",
      artifactUrl: null,
      citationCount: 3,
      venue: "Journal of Examples",
      venueType: "Journal",
      summary: null,
    });
    return job;
  }

  test("should describe a running search", () => {
    const text = formatSnapshot(snapshotOf(runningJob())).split("\n");

    expect(text[0]).toBe("# 🔄 Search client-1_search-1");
    expect(text).toContain("- **Progress**: 48.33%");
    expect(text).toContain("- **Items**: 1/3 visited, 1 extracted, 0 skipped");
    expect(text).toContain("- **Completed**: In progress");
    expect(text).toContain("- A Placeholder Study (2020) · Journal of Examples · 3 citations");
  });

  test("should show the error of a failed search", () => {
    const job = createSearchJob("https://scholar.example.org/profile/ada", "client-1", "search-1");
    job.status = "error";
    job.errorMessage = "Failed to open page session: browser unavailable";

    const text = formatSnapshot(snapshotOf(job)).split("\n");

    expect(text[0]).toBe("# ❌ Search client-1_search-1");
    expect(text).toContain("- **Items**: Not discovered yet");
    expect(text).toContain("Failed to open page session: browser unavailable");
  });

  test("should list recent searches as a table", () => {
    expect(formatRecent([])).toBe("# Recent Searches\n\nNo finished searches yet");

    const rows = formatRecent([snapshotOf(runningJob())]).split("\n");
    expect(rows[4]).toBe("| client-1_search-1 | Ada Placeholder | searching_papers | 1 | - |");
  });

  test("should summarize pool statistics", () => {
    const text = formatPoolStats({
      runningCount: 2,
      pendingCount: 1,
      completedCount: 4,
      capacity: 20,
      maxWorkers: 5,
      runningIds: ["c_s1", "c_s2"],
      completedIds: [],
    }).split("\n");

    expect(text).toContain("- Running: 2 (1 waiting for a worker)");
    expect(text).toContain("- History: 4/20");
    expect(text).toContain("- c_s2");
    expect(text[text.length - 1]).toBe("None");
  });
});
