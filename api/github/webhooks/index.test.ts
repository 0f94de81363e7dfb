import { describe, it, expect, vi, beforeEach } from "vitest";
import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";
import { MESSAGES } from "../../config.js";
import { validateEnv } from "../../lib/env-validation.js";
import { POST_MERGE_CHERRY_PICK } from "../../lib/platform/github.js";
import handler, {
  app,
  getBotLogin,
  getHealth,
  getInstallationToken,
  handleIssueComment,
  handlePullRequestClosed,
  isCommandComment,
  metrics,
  type IssueCommentContext,
  type IssueCommentPayload,
  type PullRequestClosedContext,
} from "./index.js";

const { middlewareMock } = vi.hoisted(() => ({
  middlewareMock: vi.fn().mockResolvedValue(true),
}));

// Mock probot to prevent actual initialization
vi.mock("probot", () => ({
  createProbot: vi.fn(() => ({})),
  createNodeMiddleware: vi.fn(() => middlewareMock),
}));

vi.mock("../../lib/env-validation.js", () => ({
  validateEnv: vi.fn(() => ({ valid: true, missing: [] })),
  getAppId: vi.fn(() => 12345),
}));

/**
 * Tests for the PR chat-ops webhook service
 *
 * These tests verify:
 * 1. Which comments reach the command dispatcher
 * 2. Post-merge cherry-picks on pull_request.closed
 * 3. A full dispatch against a stubbed installation client
 * 4. Health check and webhook forwarding in the HTTP handler
 */

const TEST_APP_ID = 12345;

function createInstallationOctokit() {
  return {
    auth: vi.fn().mockResolvedValue({ type: "token", token: "test-secret" }),
    rest: {
      pulls: {
        get: vi.fn().mockResolvedValue({
          data: {
            number: 42,
            state: "open",
            merged: false,
            title: "Fix widgets",
            body: "",
            html_url: "https://github.com/octo/widgets/pull/42",
            user: { login: "author" },
            head: { sha: "head123", ref: "feature" },
            base: { ref: "main" },
          },
        }),
        update: vi.fn(),
        listCommits: vi.fn().mockResolvedValue({ data: [] }),
        listReviews: vi.fn(),
        createReview: vi.fn(),
        dismissReview: vi.fn(),
        merge: vi.fn(),
        updateBranch: vi.fn().mockResolvedValue({}),
        create: vi.fn(),
      },
      issues: {
        createComment: vi.fn().mockResolvedValue({}),
        listComments: vi.fn().mockResolvedValue({
          data: [{ id: 1, user: { login: "alice" }, body: "/label bug" }],
        }),
        addLabels: vi.fn().mockResolvedValue({}),
        removeLabel: vi.fn(),
        addAssignees: vi.fn(),
        removeAssignees: vi.fn(),
        listForRepo: vi.fn(),
        update: vi.fn(),
      },
      repos: {
        getContent: vi.fn().mockRejectedValue(Object.assign(new Error("Not Found"), { status: 404 })),
        getCollaboratorPermissionLevel: vi.fn().mockResolvedValue({ data: { permission: "write" } }),
      },
      checks: {
        listForRef: vi.fn(),
        rerequestRun: vi.fn(),
      },
    },
  };
}

function createPayload(overrides: {
  body?: string;
  login?: string;
  appId?: number;
  onPullRequest?: boolean;
} = {}): IssueCommentPayload {
  return {
    comment: {
      body: overrides.body ?? "/label bug",
      user: { login: overrides.login ?? "alice" },
      performed_via_github_app: overrides.appId === undefined ? null : { id: overrides.appId },
    },
    issue: {
      number: 42,
      pull_request: overrides.onPullRequest === false ? undefined : { url: "https://api.github.com/repos/octo/widgets/pulls/42" },
    },
    repository: { owner: { login: "octo" }, name: "widgets", full_name: "octo/widgets" },
  };
}

function createContext(payload: IssueCommentPayload, octokit = createInstallationOctokit()) {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  const context: IssueCommentContext = { payload, octokit, log };
  return { context, octokit, log };
}

describe("PR chat-ops webhook", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env.APP_SLUG;
  });

  describe("helpers", () => {
    it("should recognise command comments", () => {
      expect(isCommandComment("/lgtm")).toBe(true);
      expect(isCommandComment("  \n/merge squash")).toBe(true);
      expect(isCommandComment("looks good /lgtm")).toBe(false);
    });

    it("should derive the bot login from APP_SLUG", () => {
      expect(getBotLogin({ APP_SLUG: "pr-chatops" })).toBe("pr-chatops[bot]");
      expect(getBotLogin({ APP_SLUG: "  " })).toBeUndefined();
      expect(getBotLogin({})).toBeUndefined();
    });

    it("should read the installation token from the client", async () => {
      await expect(getInstallationToken(createInstallationOctokit())).resolves.toBe("test-secret");
      await expect(getInstallationToken({ auth: vi.fn().mockResolvedValue({}) })).resolves.toBe("");
      await expect(getInstallationToken({})).resolves.toBe("");
    });
  });

  describe("issue_comment.created", () => {
    it("should ignore comments on plain issues", async () => {
      const { context, octokit } = createContext(createPayload({ onPullRequest: false }));

      await handleIssueComment(context);

      expect(octokit.rest.pulls.get).not.toHaveBeenCalled();
      expect(octokit.rest.issues.createComment).not.toHaveBeenCalled();
    });

    it("should ignore comments that are not commands", async () => {
      const { context, octokit } = createContext(createPayload({ body: "Thanks, looks good" }));

      await handleIssueComment(context);

      expect(octokit.rest.repos.getContent).not.toHaveBeenCalled();
      expect(octokit.rest.issues.createComment).not.toHaveBeenCalled();
    });

    it("should ignore comments posted by the app itself", async () => {
      const { context, octokit } = createContext(createPayload({ appId: TEST_APP_ID }));

      await handleIssueComment(context);

      expect(octokit.rest.issues.createComment).not.toHaveBeenCalled();
    });

    it("should ignore comments from the configured bot login", async () => {
      process.env.APP_SLUG = "pr-chatops";
      const { context, octokit } = createContext(createPayload({ login: "pr-chatops[bot]" }));

      await handleIssueComment(context);

      expect(octokit.rest.issues.createComment).not.toHaveBeenCalled();
    });

    it("should dispatch a PR command and record it", async () => {
      const before = metrics.count("github", "label", "success");
      const { context, octokit, log } = createContext(createPayload());

      await handleIssueComment(context);

      expect(octokit.rest.repos.getContent).toHaveBeenCalledWith({
        owner: "octo",
        repo: "widgets",
        path: ".github/pr-cli.yml",
      });
      expect(octokit.rest.issues.addLabels).toHaveBeenCalledWith({
        owner: "octo",
        repo: "widgets",
        issue_number: 42,
        labels: ["bug"],
      });
      expect(octokit.rest.issues.createComment).toHaveBeenCalledWith({
        owner: "octo",
        repo: "widgets",
        issue_number: 42,
        body: MESSAGES.labelsAdded(["bug"], "alice"),
      });
      expect(metrics.count("github", "label", "success")).toBe(before + 1);
      expect(log.error).not.toHaveBeenCalled();
    });

    it("should log a sender validation failure without posting", async () => {
      const octokit = createInstallationOctokit();
      octokit.rest.issues.listComments.mockResolvedValue({ data: [] });
      const { context, log } = createContext(createPayload(), octokit);

      await handleIssueComment(context);

      expect(octokit.rest.issues.addLabels).not.toHaveBeenCalled();
      expect(octokit.rest.issues.createComment).not.toHaveBeenCalled();
      expect(log.error).toHaveBeenCalledWith(
        { err: expect.objectContaining({ message: "comment sender 'alice' did not post a comment containing the trigger" }) },
        "Command from @alice on octo/widgets#42 failed",
      );
    });

    it("should resolve when the command reported its own failure", async () => {
      const octokit = createInstallationOctokit();
      octokit.rest.issues.listComments.mockResolvedValue({
        data: [{ id: 1, user: { login: "alice" }, body: "/rebase" }],
      });
      octokit.rest.pulls.updateBranch.mockRejectedValue(new Error("merge conflict"));
      const { context, log } = createContext(createPayload({ body: "/rebase" }), octokit);

      await expect(handleIssueComment(context)).resolves.toBeUndefined();

      expect(octokit.rest.issues.createComment).toHaveBeenCalledTimes(1);
      expect(octokit.rest.issues.createComment).toHaveBeenCalledWith(
        expect.objectContaining({ body: MESSAGES.rebaseFailed("merge conflict") }),
      );
      expect(log.error).not.toHaveBeenCalledWith(expect.anything(), "Command from @alice on octo/widgets#42 failed");
    });
  });

  describe("app", () => {
    it("should register the comment and merge handlers", () => {
      const on = vi.fn();

      app({ on });

      expect(on).toHaveBeenCalledWith("issue_comment.created", handleIssueComment);
      expect(on).toHaveBeenCalledWith("pull_request.closed", handlePullRequestClosed);
    });
  });

  describe("pull_request.closed", () => {
    function createClosedContext(merged: boolean, comments: Array<{ id: number; user: { login: string }; body: string }>) {
      const octokit = createInstallationOctokit();
      octokit.rest.pulls.get.mockResolvedValue({
        data: {
          number: 42,
          state: "closed",
          merged,
          title: "Fix widgets",
          body: "",
          html_url: "https://github.com/octo/widgets/pull/42",
          user: { login: "author" },
          head: { sha: "head123", ref: "feature" },
          base: { ref: "main" },
        },
      });
      octokit.rest.issues.listComments.mockResolvedValue({ data: comments });
      const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
      const context: PullRequestClosedContext = {
        payload: {
          pull_request: { number: 42, merged },
          repository: { owner: { login: "octo" }, name: "widgets", full_name: "octo/widgets" },
          sender: { login: "merger" },
        },
        octokit,
        log,
      };
      return { context, octokit, log };
    }

    it("should skip a PR closed without merge", async () => {
      const { context, octokit, log } = createClosedContext(false, [
        { id: 1, user: { login: "alice" }, body: "/cherry-pick release-1.0" },
      ]);

      await handlePullRequestClosed(context);

      expect(octokit.rest.pulls.get).not.toHaveBeenCalled();
      expect(octokit.rest.issues.listComments).not.toHaveBeenCalled();
      expect(log.info).toHaveBeenCalledWith("PR #42 closed without merge, no cherry-picks to run");
    });

    it("should run the post-merge built-in when the PR was merged", async () => {
      const before = metrics.count("github", POST_MERGE_CHERRY_PICK, "success");
      const { context, octokit } = createClosedContext(true, [{ id: 1, user: { login: "alice" }, body: "LGTM" }]);

      await handlePullRequestClosed(context);

      expect(octokit.rest.pulls.get).toHaveBeenCalledWith({ owner: "octo", repo: "widgets", pull_number: 42 });
      expect(octokit.rest.issues.listComments).toHaveBeenCalledTimes(1);
      expect(octokit.rest.issues.createComment).not.toHaveBeenCalled();
      expect(metrics.count("github", POST_MERGE_CHERRY_PICK, "success")).toBe(before + 1);
    });

    it("should attempt each scheduled branch on merge", async () => {
      const { context, octokit } = createClosedContext(true, [
        { id: 1, user: { login: "alice" }, body: "/cherry-pick release-1.0" },
      ]);

      await handlePullRequestClosed(context);

      expect(octokit.rest.pulls.listCommits).toHaveBeenCalledTimes(1);
      expect(octokit.rest.issues.createComment).toHaveBeenCalledTimes(1);
      expect(octokit.rest.issues.createComment).toHaveBeenCalledWith({
        owner: "octo",
        repo: "widgets",
        issue_number: 42,
        body: MESSAGES.cherryPickFailed(42, "release-1.0", "merger", "No commits found in PR"),
      });
    });
  });

  describe("HTTP Handler", () => {
    function createExchange(method: string) {
      const req = new IncomingMessage(new Socket());
      req.method = method;
      const res = new ServerResponse(req);
      const end = vi.spyOn(res, "end").mockReturnValue(res);
      const body = (): unknown => JSON.parse(String(end.mock.calls[0]?.[0]));
      return { req, res, body };
    }

    describe("GET requests (health check)", () => {
      it("should return 200 ok with the metrics snapshot", () => {
        vi.mocked(validateEnv).mockReturnValue({ valid: true, missing: [] });
        const { req, res, body } = createExchange("GET");

        handler(req, res);

        expect(res.statusCode).toBe(200);
        expect(res.getHeader("Content-Type")).toBe("application/json");
        expect(body()).toEqual({ status: "ok", service: "pr-chatops", metrics: metrics.snapshot() });
        expect(validateEnv).toHaveBeenCalledWith(true);
      });

      it("should return 503 misconfigured when environment is invalid", () => {
        vi.mocked(validateEnv).mockReturnValue({ valid: false, missing: ["APP_ID", "WEBHOOK_SECRET"] });
        const { req, res, body } = createExchange("GET");

        handler(req, res);

        expect(res.statusCode).toBe(503);
        expect(body()).toMatchObject({ status: "misconfigured", service: "pr-chatops" });
      });

      it("should build the health status from the validation result", () => {
        expect(getHealth(true).statusCode).toBe(200);
        expect(getHealth(false)).toEqual({
          statusCode: 503,
          body: { status: "misconfigured", service: "pr-chatops", metrics: metrics.snapshot() },
        });
      });
    });

    describe("POST requests (webhooks)", () => {
      it("should return 503 when environment is misconfigured", () => {
        vi.mocked(validateEnv).mockReturnValue({ valid: false, missing: ["WEBHOOK_SECRET"] });
        const { req, res, body } = createExchange("POST");

        handler(req, res);

        expect(res.statusCode).toBe(503);
        expect(body()).toEqual({ error: "Webhook processing unavailable" });
        expect(middlewareMock).not.toHaveBeenCalled();
      });

      it("should forward to middleware when environment is valid", () => {
        vi.mocked(validateEnv).mockReturnValue({ valid: true, missing: [] });
        const { req, res } = createExchange("POST");

        handler(req, res);

        expect(middlewareMock).toHaveBeenCalledWith(req, res);
      });
    });
  });
});
