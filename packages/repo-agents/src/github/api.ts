/**
 * GitHubApi — the read-only slice of the GitHub REST API agents need.
 *
 * The fetcher only talks to this interface; createOctokitApi() is the
 * production implementation, tests provide their own.
 */

import { Octokit } from "@octokit/rest";

export interface RepositoryData {
  fullName: string;
  description: string | null;
  defaultBranch: string;
  language: string | null;
  stars: number;
  forks: number;
  openIssues: number;
  topics: string[];
  url: string;
}

export interface PullRequestData {
  number: number;
  title: string;
  body: string | null;
  state: string;
  merged: boolean;
  author: string | null;
  baseRef: string;
  headRef: string;
  changedFiles: number;
  additions: number;
  deletions: number;
}

export interface PullRequestFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  /** Unified diff hunk; absent for binary or very large files */
  patch?: string;
}

export interface IssueData {
  number: number;
  title: string;
  body: string | null;
  state: string;
  author: string | null;
  labels: string[];
}

export interface CommentData {
  author: string | null;
  body: string;
}

export interface GitHubApi {
  getRepository(owner: string, repo: string): Promise<RepositoryData>;
  getPullRequest(owner: string, repo: string, number: number): Promise<PullRequestData>;
  /** Every changed file, across all pages */
  listPullRequestFiles(owner: string, repo: string, number: number): Promise<PullRequestFile[]>;
  getIssue(owner: string, repo: string, number: number): Promise<IssueData>;
  /**
   * Issue and PR conversation comments, oldest first, across all pages (PRs
   * share the issue comment API)
   */
  listIssueComments(owner: string, repo: string, number: number): Promise<CommentData[]>;
}

const PAGE_SIZE = 100;

export interface OctokitApiOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export function createOctokitApi(token: string, options: OctokitApiOptions = {}): GitHubApi {
  const octokit = new Octokit({
    auth: token,
    userAgent: "repo-agents",
    request: { fetch: options.fetch ?? fetch },
  });

  return {
    async getRepository(owner, repo) {
      const { data } = await octokit.rest.repos.get({ owner, repo });
      return {
        fullName: data.full_name,
        description: data.description,
        defaultBranch: data.default_branch,
        language: data.language ?? null,
        stars: data.stargazers_count,
        forks: data.forks_count,
        openIssues: data.open_issues_count,
        topics: data.topics ?? [],
        url: data.html_url,
      };
    },

    async getPullRequest(owner, repo, number) {
      const { data } = await octokit.rest.pulls.get({ owner, repo, pull_number: number });
      return {
        number: data.number,
        title: data.title,
        body: data.body,
        state: data.state,
        merged: data.merged,
        author: data.user?.login ?? null,
        baseRef: data.base.ref,
        headRef: data.head.ref,
        changedFiles: data.changed_files,
        additions: data.additions,
        deletions: data.deletions,
      };
    },

    async listPullRequestFiles(owner, repo, number) {
      const files = await octokit.paginate(octokit.rest.pulls.listFiles, {
        owner,
        repo,
        pull_number: number,
        per_page: PAGE_SIZE,
      });
      return files.map((file) => ({
        filename: file.filename,
        status: file.status,
        additions: file.additions,
        deletions: file.deletions,
        patch: file.patch,
      }));
    },

    async getIssue(owner, repo, number) {
      const { data } = await octokit.rest.issues.get({ owner, repo, issue_number: number });
      return {
        number: data.number,
        title: data.title,
        body: data.body ?? null,
        state: data.state,
        author: data.user?.login ?? null,
        labels: data.labels
          .map((label) => (typeof label === "string" ? label : (label.name ?? "")))
          .filter((name) => name.length > 0),
      };
    },

    async listIssueComments(owner, repo, number) {
      const comments = await octokit.paginate(octokit.rest.issues.listComments, {
        owner,
        repo,
        issue_number: number,
        per_page: PAGE_SIZE,
      });
      return comments.map((comment) => ({
        author: comment.user?.login ?? null,
        body: comment.body ?? "",
      }));
    },
  };
}
