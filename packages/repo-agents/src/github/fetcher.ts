/**
 * GitHub Context Fetcher — renders repository, issue and PR metadata as
 * plain text for prompt injection.
 *
 * Read-only, uncached: one fetch per agent execution that names a
 * repository.
 */

import type { Config } from "../config.ts";
import {
  AgentsError,
  AuthError,
  classifyUpstreamError,
  messageOf,
  MissingCredentialError,
  NotFoundError,
  RateLimitedError,
  statusOf,
  ValidationError,
} from "../errors.ts";
import {
  createOctokitApi,
  type CommentData,
  type GitHubApi,
  type IssueData,
  type PullRequestData,
  type PullRequestFile,
  type RepositoryData,
} from "./api.ts";

export interface ContextRequest {
  /** owner/name */
  repository: string;
  issueNumber?: number;
  prNumber?: number;
}

export interface ContextFetcher {
  fetch(request: ContextRequest): Promise<string>;
}

export interface RepositoryRef {
  owner: string;
  repo: string;
}

const REPOSITORY_RE = /^([A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)\/([A-Za-z0-9._-]+)$/;

/**
 * Split "owner/name".
 * @throws ValidationError for anything else
 */
export function parseRepository(repository: string): RepositoryRef {
  const match = repository.trim().match(REPOSITORY_RE);
  if (!match?.[1] || !match[2]) {
    throw new ValidationError(`Invalid repository: ${repository}. Expected format: owner/name`);
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Map a GitHub API failure onto the taxonomy.
 *
 * GitHub answers 404 for private resources the token cannot see, and 403 for
 * both missing permissions and exhausted rate limits; the message tells the
 * two apart.
 */
export function toGitHubError(error: unknown, subject: string): AgentsError {
  if (error instanceof AgentsError) return error;

  const status = statusOf(error);
  const message = messageOf(error);
  const rateLimited = /rate limit/i.test(message);

  if (status === 401) {
    return new AuthError(`GitHub rejected the token: ${message}`, { cause: error });
  }
  if (status === 429 || (status === 403 && rateLimited)) {
    return new RateLimitedError(`GitHub rate limited: ${message}`, { cause: error });
  }
  if (status === 404 || status === 403) {
    return new NotFoundError(`GitHub ${subject} not found or not accessible`, { cause: error });
  }
  return classifyUpstreamError(error, "GitHub");
}

export interface FetcherOptions {
  /** Characters of diff kept per file (default: 2000) */
  maxPatchChars?: number;
  /** Most recent comments included (default: 10) */
  maxComments?: number;
  /** Changed files listed in a PR diff (default: 50) */
  maxFiles?: number;
}

export class GitHubContextFetcher implements ContextFetcher {
  private api: GitHubApi;
  private maxPatchChars: number;
  private maxComments: number;
  private maxFiles: number;

  constructor(api: GitHubApi, options: FetcherOptions = {}) {
    this.api = api;
    this.maxPatchChars = options.maxPatchChars ?? 2000;
    this.maxComments = options.maxComments ?? 10;
    this.maxFiles = options.maxFiles ?? 50;
  }

  async fetch(request: ContextRequest): Promise<string> {
    const { owner, repo } = parseRepository(request.repository);
    const { prNumber, issueNumber } = request;
    const sections: string[] = [];

    if (prNumber !== undefined) {
      const subject = `pull request ${owner}/${repo}#${prNumber}`;
      sections.push(await this.guard(subject, () => this.pullRequestSection(owner, repo, prNumber)));
    }
    if (issueNumber !== undefined) {
      const subject = `issue ${owner}/${repo}#${issueNumber}`;
      sections.push(await this.guard(subject, () => this.issueSection(owner, repo, issueNumber)));
    }
    if (sections.length === 0) {
      const subject = `repository ${owner}/${repo}`;
      sections.push(await this.guard(subject, () => this.repositorySection(owner, repo)));
    }

    return sections.join("\n\n");
  }

  private async guard(subject: string, load: () => Promise<string>): Promise<string> {
    try {
      return await load();
    } catch (error) {
      throw toGitHubError(error, subject);
    }
  }

  private async repositorySection(owner: string, repo: string): Promise<string> {
    return formatRepository(await this.api.getRepository(owner, repo));
  }

  private async pullRequestSection(owner: string, repo: string, number: number): Promise<string> {
    const [pr, files, comments] = await Promise.all([
      this.api.getPullRequest(owner, repo, number),
      this.api.listPullRequestFiles(owner, repo, number),
      this.api.listIssueComments(owner, repo, number),
    ]);
    return [
      formatPullRequest(pr),
      formatFiles(files, Math.max(pr.changedFiles, files.length), this.maxFiles, this.maxPatchChars),
      formatComments(comments.slice(-this.maxComments)),
    ]
      .filter((part) => part.length > 0)
      .join("\n\n");
  }

  private async issueSection(owner: string, repo: string, number: number): Promise<string> {
    const [issue, comments] = await Promise.all([
      this.api.getIssue(owner, repo, number),
      this.api.listIssueComments(owner, repo, number),
    ]);
    return [formatIssue(issue), formatComments(comments.slice(-this.maxComments))]
      .filter((part) => part.length > 0)
      .join("\n\n");
  }
}

/** Stands in when GITHUB_TOKEN is unset: agents without repository context still work */
export class UnconfiguredContextFetcher implements ContextFetcher {
  async fetch(): Promise<string> {
    throw new MissingCredentialError("GITHUB_TOKEN");
  }
}

export function createContextFetcher(config: Config, options?: FetcherOptions): ContextFetcher {
  if (!config.githubToken) return new UnconfiguredContextFetcher();
  return new GitHubContextFetcher(createOctokitApi(config.githubToken), options);
}

// ── Formatting ─────────────────────────────────────────────────────

function formatRepository(r: RepositoryData): string {
  return [
    `Repository: ${r.fullName}`,
    `Description: ${r.description || "No description provided"}`,
    `Default branch: ${r.defaultBranch}`,
    `Language: ${r.language ?? "unknown"}`,
    `Stars: ${r.stars}`,
    `Forks: ${r.forks}`,
    `Open issues: ${r.openIssues}`,
    `Topics: ${r.topics.length > 0 ? r.topics.join(", ") : "none"}`,
    `URL: ${r.url}`,
  ].join("\n");
}

function formatPullRequest(pr: PullRequestData): string {
  return [
    `Title: ${pr.title}`,
    `Author: ${pr.author ?? "unknown"}`,
    `State: ${pr.merged ? "merged" : pr.state}`,
    `Branch: ${pr.headRef} → ${pr.baseRef}`,
    `Description: ${pr.body || "No description provided"}`,
    "",
    `Files changed: ${pr.changedFiles}`,
    `Additions: +${pr.additions}`,
    `Deletions: -${pr.deletions}`,
  ].join("\n");
}

function formatFiles(
  files: PullRequestFile[],
  total: number,
  maxFiles: number,
  maxPatchChars: number,
): string {
  if (files.length === 0) return "";
  const shown = files.slice(0, maxFiles);
  const lines = ["Diff:"];
  for (const file of shown) {
    lines.push(`--- ${file.filename} (${file.status}, +${file.additions}/-${file.deletions})`);
    if (file.patch) {
      const truncated = file.patch.length > maxPatchChars;
      lines.push(truncated ? `${file.patch.slice(0, maxPatchChars)}\n[diff truncated]` : file.patch);
    }
  }
  if (total > shown.length) {
    lines.push(`[${total - shown.length} more files not shown]`);
  }
  return lines.join("\n");
}

function formatIssue(issue: IssueData): string {
  return [
    `Title: ${issue.title}`,
    `Author: ${issue.author ?? "unknown"}`,
    `Body: ${issue.body || "No description provided"}`,
    `Labels: ${issue.labels.length > 0 ? issue.labels.join(", ") : "none"}`,
    `State: ${issue.state}`,
  ].join("\n");
}

function formatComments(comments: CommentData[]): string {
  if (comments.length === 0) return "";
  const lines = ["Comments:"];
  for (const comment of comments) {
    lines.push(`- ${comment.author ?? "unknown"}: ${comment.body}`);
  }
  return lines.join("\n");
}
