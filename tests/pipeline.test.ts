import { beforeEach, describe, test, expect, vi } from "vitest";
import { Octokit, RequestError } from "octokit";
import {
  fetchCompareDiff,
  fetchFileContent,
  fetchPRDiff,
  postReview,
} from "../src/github/client.js";
import { runReview } from "../src/review/pipeline.js";
import type { PRDetails } from "../src/github/event.js";
import type { ReviewSettings } from "../src/repo-config.js";
import type {
  LLMProvider,
  ReviewRequest,
  ReviewResult,
} from "../src/llm/types.js";
import { MIXED_DIFF, RENAMED_ONLY_DIFF, RENAMED_HUNKS } from "./fixtures/diffs.js";

vi.mock("../src/github/client.js", () => ({
  fetchPRDiff: vi.fn(),
  fetchCompareDiff: vi.fn(),
  fetchFileContent: vi.fn(),
  postReview: vi.fn(),
}));

class FakeProvider implements LLMProvider {
  readonly name = "fake";
  readonly requests: ReviewRequest[] = [];

  constructor(private readonly results: ReviewResult[]) {}

  async review(request: ReviewRequest): Promise<ReviewResult> {
    this.requests.push(request);
    const result = this.results[this.requests.length - 1];
    if (!result) throw new Error("No fake result left");
    return result;
  }
}

const octokit = new Octokit({ auth: "test-token" });

const details: PRDetails = {
  owner: "acme",
  repo: "widgets",
  pullNumber: 7,
  title: "Add retries",
  description: "Wraps the client calls.",
  headSha: "headsha",
  baseRef: "main",
  action: "opened",
};

const settings: ReviewSettings = {
  exclude: [],
  maxFiles: 50,
  maxChunkChars: 30_000,
  reviewStyle: "both",
  enabled: true,
  dryRun: false,
};

function deps(provider: LLMProvider) {
  return { octokit, provider, apiKey: "test-key", model: "test-model" };
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.mocked(fetchFileContent).mockResolvedValue(null);
  vi.mocked(fetchPRDiff).mockResolvedValue(MIXED_DIFF);
  vi.mocked(postReview).mockResolvedValue(undefined);
});

describe("runReview", () => {
  test("reviews the PR diff and posts the review", async () => {
    const provider = new FakeProvider([
      {
        summary: "Looks fine.",
        comments: [
          { path: "src/new.ts", line: 2, body: "Use a const enum.", severity: "suggestion" },
          { path: "src/new.ts", line: 40, body: "Out of range.", severity: "warning" },
        ],
        usage: { promptTokens: 120, completionTokens: 30 },
      },
    ]);

    const outcome = await runReview(details, settings, deps(provider));

    expect(fetchFileContent).toHaveBeenCalledWith(
      octokit,
      "acme",
      "widgets",
      ".airecommender.yml",
      "main"
    );
    expect(fetchCompareDiff).not.toHaveBeenCalled();
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0]).toEqual({
      diff:
        "### src/new.ts\n@@ -0,0 +1,3 @@\n+export const a = 1;\n+export const b = 2;\n+export const c = 3;\n\n" +
        `### lib/b.ts\n${RENAMED_HUNKS}\n\n`,
      prTitle: "Add retries",
      prDescription: "Wraps the client calls.",
      customInstructions: undefined,
    });

    expect(postReview).toHaveBeenCalledWith(
      octokit,
      "acme",
      "widgets",
      7,
      "headsha",
      "## AI Review Summary\n\nLooks fine.\n\n" +
        "### Additional notes\n\n- **WARNING** `src/new.ts:40`: Out of range.\n\n" +
        "---\n*1 inline comment(s) posted.*",
      [{ path: "src/new.ts", line: 2, body: "🔵 **SUGGESTION**\n\nUse a const enum." }]
    );
    expect(outcome).toMatchObject({
      status: "posted",
      commentCount: 2,
      usage: { promptTokens: 120, completionTokens: 30 },
    });
  });

  test("reviews only the pushed commits on synchronize", async () => {
    vi.mocked(fetchCompareDiff).mockResolvedValue(RENAMED_ONLY_DIFF);
    const provider = new FakeProvider([
      {
        summary: "Small fix.",
        comments: [
          { path: "src/new.ts", line: 1, body: "Export a type too.", severity: "nitpick" },
        ],
      },
    ]);

    await runReview(
      { ...details, action: "synchronize", before: "aaa", after: "bbb" },
      settings,
      deps(provider)
    );

    expect(fetchCompareDiff).toHaveBeenCalledWith(octokit, "acme", "widgets", "aaa", "bbb");
    expect(provider.requests[0].diff).toBe(`### lib/b.ts\n${RENAMED_HUNKS}\n\n`);
    // Lines are validated against the whole PR diff, not just the pushed range.
    expect(postReview).toHaveBeenCalledWith(
      octokit,
      "acme",
      "widgets",
      7,
      "headsha",
      "## AI Review Summary\n\nSmall fix.\n\n---\n*1 inline comment(s) posted.*",
      [{ path: "src/new.ts", line: 1, body: "⚪ **NITPICK**\n\nExport a type too." }]
    );
  });

  test("drops pushed files the PR does not change", async () => {
    vi.mocked(fetchCompareDiff).mockResolvedValue(
      RENAMED_ONLY_DIFF +
        "diff --git a/other/unrelated.ts b/other/unrelated.ts\n" +
        "new file mode 100644\n" +
        "--- /dev/null\n" +
        "+++ b/other/unrelated.ts\n" +
        "@@ -0,0 +1,1 @@\n" +
        "+export const fromMain = 1;\n"
    );
    const provider = new FakeProvider([{ summary: "Fine.", comments: [] }]);

    await runReview(
      { ...details, action: "synchronize", before: "aaa", after: "bbb" },
      settings,
      deps(provider)
    );

    expect(provider.requests[0].diff).toBe(`### lib/b.ts\n${RENAMED_HUNKS}\n\n`);
  });

  test("skips when the pushed range only touches files outside the PR", async () => {
    vi.mocked(fetchCompareDiff).mockResolvedValue(
      "diff --git a/other/unrelated.ts b/other/unrelated.ts\n" +
        "--- a/other/unrelated.ts\n" +
        "+++ b/other/unrelated.ts\n" +
        "@@ -1 +1 @@\n" +
        "-old\n" +
        "+new\n"
    );
    const provider = new FakeProvider([]);

    const outcome = await runReview(
      { ...details, action: "synchronize", before: "aaa", after: "bbb" },
      settings,
      deps(provider)
    );

    expect(outcome).toEqual({ status: "skipped", reason: "No reviewable files." });
    expect(provider.requests).toHaveLength(0);
  });

  test("falls back to the PR diff when the pushed range is gone", async () => {
    vi.mocked(fetchCompareDiff).mockRejectedValue(
      new RequestError("Not Found", 404, {
        request: {
          method: "GET",
          url: "https://api.github.com/repos/acme/widgets/compare/aaa...bbb",
          headers: {},
        },
      })
    );
    const provider = new FakeProvider([{ summary: "Fine.", comments: [] }]);

    const outcome = await runReview(
      { ...details, action: "synchronize", before: "aaa", after: "bbb" },
      settings,
      deps(provider)
    );

    expect(outcome.status).toBe("posted");
    expect(provider.requests[0].diff.startsWith("### src/new.ts\n")).toBe(true);
    expect(provider.requests[0].diff).toContain("### lib/b.ts\n");
  });

  test("propagates other compare failures", async () => {
    vi.mocked(fetchCompareDiff).mockRejectedValue(new Error("bad credentials"));
    const provider = new FakeProvider([]);

    await expect(
      runReview(
        { ...details, action: "synchronize", before: "aaa", after: "bbb" },
        settings,
        deps(provider)
      )
    ).rejects.toThrow("bad credentials");
  });

  test("skips when the repo config disables reviews", async () => {
    vi.mocked(fetchFileContent).mockResolvedValue("enabled: false\n");
    const provider = new FakeProvider([]);

    const outcome = await runReview(details, settings, deps(provider));

    expect(outcome).toEqual({ status: "skipped", reason: "Disabled via repo config" });
    expect(fetchPRDiff).not.toHaveBeenCalled();
  });

  test("skips when every file is excluded", async () => {
    const provider = new FakeProvider([]);

    const outcome = await runReview(
      details,
      { ...settings, exclude: ["*.ts"] },
      deps(provider)
    );

    expect(outcome).toEqual({ status: "skipped", reason: "No reviewable files." });
    expect(provider.requests).toHaveLength(0);
    expect(postReview).not.toHaveBeenCalled();
  });

  test("sends one request per chunk and combines the results", async () => {
    const provider = new FakeProvider([
      { summary: "First.", comments: [], usage: { promptTokens: 10, completionTokens: 2 } },
      { summary: "Second.", comments: [], usage: { promptTokens: 20, completionTokens: 4 } },
    ]);

    const outcome = await runReview(
      details,
      { ...settings, maxChunkChars: 10 },
      deps(provider)
    );

    expect(provider.requests).toHaveLength(2);
    expect(outcome).toMatchObject({
      status: "posted",
      commentCount: 0,
      usage: { promptTokens: 30, completionTokens: 6 },
    });
    expect(vi.mocked(postReview).mock.calls[0][5]).toBe(
      "## AI Review Summary\n\nFirst.\n\nSecond.\n\n---\n*No issues found. Looks good!*"
    );
  });

  test("does not post in dry-run mode", async () => {
    const provider = new FakeProvider([{ summary: "Fine.", comments: [] }]);

    const outcome = await runReview(
      details,
      { ...settings, dryRun: true },
      deps(provider)
    );

    expect(outcome.status).toBe("dry-run");
    expect(postReview).not.toHaveBeenCalled();
  });

  test("applies repo config overrides", async () => {
    vi.mocked(fetchFileContent).mockResolvedValue(
      "exclude:\n  - 'lib/**'\ncustomInstructions: Focus on security.\n"
    );
    const provider = new FakeProvider([{ summary: "Fine.", comments: [] }]);

    await runReview(details, settings, deps(provider));

    expect(provider.requests[0].customInstructions).toBe("Focus on security.");
    expect(provider.requests[0].diff.startsWith("### src/new.ts\n")).toBe(true);
    expect(provider.requests[0].diff).not.toContain("### lib/b.ts");
  });

  test("propagates provider failures", async () => {
    const provider: LLMProvider = {
      name: "failing",
      review: async () => {
        throw new Error("invalid api key");
      },
    };

    await expect(runReview(details, settings, deps(provider))).rejects.toThrow(
      "invalid api key"
    );
    expect(postReview).not.toHaveBeenCalled();
  });
});
