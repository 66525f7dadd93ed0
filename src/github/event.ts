import { readFile } from "node:fs/promises";
import { z } from "zod";

const SUPPORTED_ACTIONS = new Set(["opened", "synchronize"]);

const pullRequestEventSchema = z.object({
  action: z.string(),
  number: z.number().int().positive(),
  before: z.string().optional(),
  after: z.string().optional(),
  pull_request: z.object({
    title: z.string(),
    body: z.string().nullable().optional(),
    head: z.object({ sha: z.string() }),
    base: z.object({ ref: z.string() }),
    draft: z.boolean().optional(),
  }),
  repository: z.object({
    name: z.string(),
    owner: z.object({ login: z.string() }),
  }),
});

export type PullRequestEvent = z.infer<typeof pullRequestEventSchema>;

export interface PRDetails {
  owner: string;
  repo: string;
  pullNumber: number;
  title: string;
  description: string;
  headSha: string;
  baseRef: string;
  action: string;
  before?: string;
  after?: string;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readGitHubEvent(eventPath: string): Promise<unknown> {
  if (!eventPath) {
    throw new Error(`No GitHub event file found at ${eventPath}`);
  }

  let raw: string;
  try {
    raw = await readFile(eventPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      throw new Error(`No GitHub event file found at ${eventPath}`);
    }
    throw err;
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`GitHub event file ${eventPath} is not valid JSON`);
  }
}

export function parsePullRequestEvent(data: unknown): PullRequestEvent {
  const result = pullRequestEventSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Not a pull_request event payload (${issues})`);
  }
  return result.data;
}

export function isSupportedAction(action: string): boolean {
  return SUPPORTED_ACTIONS.has(action);
}

export function getPRDetails(event: PullRequestEvent): PRDetails {
  return {
    owner: event.repository.owner.login,
    repo: event.repository.name,
    pullNumber: event.number,
    title: event.pull_request.title,
    description: event.pull_request.body ?? "",
    headSha: event.pull_request.head.sha,
    baseRef: event.pull_request.base.ref,
    action: event.action,
    before: event.before,
    after: event.after,
  };
}
