/**
 * PR Operations
 *
 * GitHub REST calls the comment commands make against a pull request and
 * its repository. Pagination follows the page/per_page loop used across
 * the codebase.
 */

import type { PRRef } from "./types.js";
import { validateClient, PR_CLIENT_CHECKS } from "./client-validation.js";
import { getErrorStatus } from "./transient-error.js";
import type { MergeMethod } from "../config.js";

const PER_PAGE = 100;

/**
 * Minimal GitHub client interface for PR operations.
 * Both Probot's octokit and the octokit package satisfy this interface.
 */
export interface PRClient {
  rest: {
    pulls: {
      get: (params: { owner: string; repo: string; pull_number: number }) => Promise<{
        data: {
          number: number;
          state: string;
          merged: boolean;
          title: string;
          body: string | null;
          html_url: string;
          user: { login: string } | null;
          head: { sha: string; ref: string };
          base: { ref: string };
        };
      }>;

      update: (params: {
        owner: string;
        repo: string;
        pull_number: number;
        state?: "open" | "closed";
        body?: string;
      }) => Promise<unknown>;

      listCommits: (params: {
        owner: string;
        repo: string;
        pull_number: number;
        per_page?: number;
        page?: number;
      }) => Promise<{ data: Array<{ sha: string }> }>;

      listReviews: (params: {
        owner: string;
        repo: string;
        pull_number: number;
        per_page?: number;
        page?: number;
      }) => Promise<{
        data: Array<{
          id: number;
          state: string;
          user: { login: string; type?: string } | null;
        }>;
      }>;

      createReview: (params: {
        owner: string;
        repo: string;
        pull_number: number;
        event: "APPROVE" | "COMMENT" | "REQUEST_CHANGES";
        body?: string;
      }) => Promise<unknown>;

      dismissReview: (params: {
        owner: string;
        repo: string;
        pull_number: number;
        review_id: number;
        message: string;
      }) => Promise<unknown>;

      merge: (params: {
        owner: string;
        repo: string;
        pull_number: number;
        merge_method?: MergeMethod;
      }) => Promise<{ data: { merged: boolean; message: string; sha: string } }>;

      updateBranch: (params: { owner: string; repo: string; pull_number: number }) => Promise<unknown>;

      create: (params: {
        owner: string;
        repo: string;
        title: string;
        head: string;
        base: string;
        body?: string;
      }) => Promise<{ data: { number: number; html_url: string } }>;
    };
    issues: {
      createComment: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        body: string;
      }) => Promise<unknown>;

      listComments: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        per_page?: number;
        page?: number;
      }) => Promise<{
        data: Array<{
          id: number;
          body?: string;
          user: { login: string } | null;
        }>;
      }>;

      addLabels: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        labels: string[];
      }) => Promise<unknown>;

      removeLabel: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        name: string;
      }) => Promise<unknown>;

      addAssignees: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        assignees: string[];
      }) => Promise<unknown>;

      removeAssignees: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        assignees: string[];
      }) => Promise<unknown>;

      listForRepo: (params: {
        owner: string;
        repo: string;
        state?: "open" | "closed" | "all";
        creator?: string;
        sort?: "created" | "updated" | "comments";
        direction?: "asc" | "desc";
        per_page?: number;
        page?: number;
      }) => Promise<{
        data: Array<{
          number: number;
          title: string;
          body?: string | null;
          user: { login: string } | null;
          pull_request?: unknown;
        }>;
      }>;

      update: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        body?: string;
      }) => Promise<unknown>;
    };
    repos: {
      getCollaboratorPermissionLevel: (params: {
        owner: string;
        repo: string;
        username: string;
      }) => Promise<{ data: { permission: string } }>;
    };
    checks: {
      listForRef: (params: {
        owner: string;
        repo: string;
        ref: string;
        per_page?: number;
        page?: number;
      }) => Promise<{
        data: {
          total_count: number;
          check_runs: Array<{
            id: number;
            name: string;
            status: string;
            conclusion: string | null;
            html_url: string | null;
          }>;
        };
      }>;

      rerequestRun: (params: { owner: string; repo: string; check_run_id: number }) => Promise<unknown>;
    };
  };
}

/**
 * Validate that an object has the expected structure of a PRClient.
 */
export function isValidPRClient(obj: unknown): obj is PRClient {
  return validateClient(obj, PR_CLIENT_CHECKS);
}

export interface PullRequestInfo {
  number: number;
  state: string;
  merged: boolean;
  title: string;
  body: string;
  url: string;
  author: string;
  headSha: string;
  baseRef: string;
}

export interface CommentInfo {
  id: number;
  author: string;
  body: string;
}

export interface ReviewInfo {
  id: number;
  state: string;
  author: string;
  isBot: boolean;
}

export interface CheckRunInfo {
  id: number;
  name: string;
  status: string;
  conclusion: string | null;
  url: string | null;
}

export interface IssueInfo {
  number: number;
  title: string;
  body: string;
  author: string;
}

/**
 * Create PROperations from any Octokit-like client.
 *
 * @throws Error if the provided object doesn't have the required structure
 */
export function createPROperations(octokit: unknown): PROperations {
  if (!isValidPRClient(octokit)) {
    throw new Error(
      "Invalid GitHub client: expected an Octokit-like object with rest.pulls, rest.issues, rest.repos and rest.checks methods",
    );
  }
  return new PROperations(octokit);
}

/**
 * PR operations - shared by the webhook and the CLI
 */
export class PROperations {
  constructor(private client: PRClient) {}

  /**
   * Collect every page of a list endpoint.
   */
  private async paginate<T>(fetchPage: (page: number, perPage: number) => Promise<T[]>): Promise<T[]> {
    const all: T[] = [];
    let page = 1;

    while (true) {
      const data = await fetchPage(page, PER_PAGE);
      all.push(...data);
      if (data.length < PER_PAGE) break;
      page++;
    }

    return all;
  }

  /**
   * Get PR details
   */
  async get(ref: PRRef): Promise<PullRequestInfo> {
    const { data } = await this.client.rest.pulls.get({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
    });

    return {
      number: data.number,
      state: data.state,
      merged: data.merged,
      title: data.title,
      body: data.body ?? "",
      url: data.html_url,
      author: data.user?.login ?? "unknown",
      headSha: data.head.sha,
      baseRef: data.base.ref,
    };
  }

  /**
   * Close a PR
   */
  async close(ref: PRRef): Promise<void> {
    await this.client.rest.pulls.update({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
      state: "closed",
    });
  }

  async updateBody(ref: PRRef, body: string): Promise<void> {
    await this.client.rest.pulls.update({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
      body,
    });
  }

  /**
   * Commit SHAs of a PR, oldest first
   */
  async listCommitShas(ref: PRRef): Promise<string[]> {
    const commits = await this.paginate(async (page, perPage) => {
      const { data } = await this.client.rest.pulls.listCommits({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.prNumber,
        per_page: perPage,
        page,
      });
      return data;
    });
    return commits.map((commit) => commit.sha);
  }

  async listReviews(ref: PRRef): Promise<ReviewInfo[]> {
    const reviews = await this.paginate(async (page, perPage) => {
      const { data } = await this.client.rest.pulls.listReviews({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.prNumber,
        per_page: perPage,
        page,
      });
      return data;
    });
    return reviews.map((review) => {
      const author = review.user?.login ?? "unknown";
      return {
        id: review.id,
        state: review.state,
        author,
        isBot: review.user?.type === "Bot" || author.endsWith("[bot]"),
      };
    });
  }

  async approve(ref: PRRef, body: string): Promise<void> {
    await this.client.rest.pulls.createReview({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
      event: "APPROVE",
      body,
    });
  }

  async dismissReview(ref: PRRef, reviewId: number, message: string): Promise<void> {
    await this.client.rest.pulls.dismissReview({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
      review_id: reviewId,
      message,
    });
  }

  /**
   * Merge a PR.
   *
   * @throws Error when GitHub answers without merging
   */
  async merge(ref: PRRef, method: MergeMethod): Promise<void> {
    const { data } = await this.client.rest.pulls.merge({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
      merge_method: method,
    });
    if (!data.merged) {
      throw new Error(`merge was not performed: ${data.message}`);
    }
  }

  /**
   * Bring the PR branch up to date with its base
   */
  async updateBranch(ref: PRRef): Promise<void> {
    await this.client.rest.pulls.updateBranch({
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
    });
  }

  async createPullRequest(
    owner: string,
    repo: string,
    pr: { title: string; head: string; base: string; body: string },
  ): Promise<{ number: number; url: string }> {
    const { data } = await this.client.rest.pulls.create({ owner, repo, ...pr });
    return { number: data.number, url: data.html_url };
  }

  /**
   * Post a comment on a PR (uses issues API)
   */
  async comment(ref: PRRef, body: string): Promise<void> {
    await this.client.rest.issues.createComment({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.prNumber,
      body,
    });
  }

  /**
   * List all comments on a PR, oldest first
   */
  async listComments(ref: PRRef): Promise<CommentInfo[]> {
    const comments = await this.paginate(async (page, perPage) => {
      const { data } = await this.client.rest.issues.listComments({
        owner: ref.owner,
        repo: ref.repo,
        issue_number: ref.prNumber,
        per_page: perPage,
        page,
      });
      return data;
    });
    return comments.map((comment) => ({
      id: comment.id,
      author: comment.user?.login ?? "unknown",
      body: comment.body ?? "",
    }));
  }

  /**
   * Add labels to a PR (uses issues API)
   */
  async addLabels(ref: PRRef, labels: string[]): Promise<void> {
    await this.client.rest.issues.addLabels({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.prNumber,
      labels,
    });
  }

  /**
   * Remove a label from a PR (uses issues API)
   */
  async removeLabel(ref: PRRef, label: string): Promise<void> {
    try {
      await this.client.rest.issues.removeLabel({
        owner: ref.owner,
        repo: ref.repo,
        issue_number: ref.prNumber,
        name: label,
      });
    } catch (error) {
      // Label might not exist - ignore 404 errors
      if (getErrorStatus(error) !== 404) {
        throw error;
      }
    }
  }

  async addAssignees(ref: PRRef, assignees: string[]): Promise<void> {
    await this.client.rest.issues.addAssignees({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.prNumber,
      assignees,
    });
  }

  async removeAssignees(ref: PRRef, assignees: string[]): Promise<void> {
    await this.client.rest.issues.removeAssignees({
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.prNumber,
      assignees,
    });
  }

  /**
   * Oldest open issue (not PR) with exactly `title`, optionally by `author`.
   * Titles compare exactly; authors case-insensitively.
   */
  async findOpenIssue(owner: string, repo: string, title: string, author?: string): Promise<IssueInfo | null> {
    let page = 1;

    while (true) {
      const { data } = await this.client.rest.issues.listForRepo({
        owner,
        repo,
        state: "open",
        creator: author,
        sort: "created",
        direction: "asc",
        per_page: PER_PAGE,
        page,
      });

      const match = data.find(
        (issue) =>
          issue.pull_request === undefined &&
          issue.title === title &&
          (!author || issue.user?.login.toLowerCase() === author.toLowerCase()),
      );
      if (match) {
        return {
          number: match.number,
          title: match.title,
          body: match.body ?? "",
          author: match.user?.login ?? "unknown",
        };
      }

      if (data.length < PER_PAGE) return null;
      page++;
    }
  }

  async updateIssueBody(owner: string, repo: string, issueNumber: number, body: string): Promise<void> {
    await this.client.rest.issues.update({ owner, repo, issue_number: issueNumber, body });
  }

  /**
   * Repository permission of a user: admin, maintain, write, triage, read or none
   */
  async getPermission(owner: string, repo: string, username: string): Promise<string> {
    const { data } = await this.client.rest.repos.getCollaboratorPermissionLevel({ owner, repo, username });
    return data.permission;
  }

  /**
   * All check runs reported for a commit
   */
  async getCheckRunsForRef(owner: string, repo: string, ref: string): Promise<CheckRunInfo[]> {
    const runs = await this.paginate(async (page, perPage) => {
      const { data } = await this.client.rest.checks.listForRef({ owner, repo, ref, per_page: perPage, page });
      return data.check_runs;
    });
    return runs.map((run) => ({
      id: run.id,
      name: run.name,
      status: run.status,
      conclusion: run.conclusion,
      url: run.html_url,
    }));
  }

  async rerequestCheckRun(owner: string, repo: string, checkRunId: number): Promise<void> {
    await this.client.rest.checks.rerequestRun({ owner, repo, check_run_id: checkRunId });
  }
}
