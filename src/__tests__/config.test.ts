import { describe, expect, it } from "vitest";
import { ActionInputs, createConfig, parseRepository } from "../config";
import { ValidationError } from "../errors";
import { GithubVcsService } from "../github";
import { JiraTicketService } from "../jira";

const inputs: ActionInputs = {
  githubToken: "test-token",
  repository: "acme/factory",
  ref: "main",
  githubServerUrl: "https://github.com",
  jiraBaseUrl: "https://jira.example.com",
  jiraEmail: "bot@example.com",
  jiraApiToken: "test-secret",
  componentRootPath: "components/",
  components: "scanner, ui",
  releaseComponent: "",
  releaseVersion: "",
  retryAttempts: "3",
  retryInitialDelayMs: "2000",
  htmlOutput: "TRUE",
  workspace: "/tmp/workspace",
};

describe("createConfig", () => {
  it("builds services and options from inputs", () => {
    const { config, options } = createConfig(inputs);

    expect(config.vcsService).toBeInstanceOf(GithubVcsService);
    expect(config.ticketService).toBeInstanceOf(JiraTicketService);
    expect(config.componentRootPath).toBe("components");
    expect(config.retryPolicy).toEqual({ attempts: 3, initialDelayMs: 2000 });
    expect(config.links).toEqual({
      githubUrl: "https://github.com",
      repo: { owner: "acme", repo: "factory" },
      jiraBrowseUrl: "https://jira.example.com/browse/",
    });
    expect(config.htmlOutput).toBe(true);
    expect(options).toEqual({ components: ["scanner", "ui"], pendingRelease: undefined });
  });

  it("selects every component for 'all' or an empty list", () => {
    expect(createConfig({ ...inputs, components: "all" }).options.components).toBeUndefined();
    expect(createConfig({ ...inputs, components: "" }).options.components).toBeUndefined();
  });

  it("reads a pending release", () => {
    const { options } = createConfig({ ...inputs, releaseComponent: "scanner", releaseVersion: "1.2.0" });
    expect(options.pendingRelease).toEqual({ component: "scanner", version: "1.2.0" });
  });

  it("requires both pending release inputs", () => {
    expect(() => createConfig({ ...inputs, releaseComponent: "scanner" })).toThrow(ValidationError);
  });

  it("reports missing required inputs", () => {
    expect(() => createConfig({ ...inputs, jiraBaseUrl: "" })).toThrow(
      "Input required and not supplied: jira-base-url (or JIRA_BASE_URL)",
    );
  });

  it("validates the retry policy", () => {
    expect(() => createConfig({ ...inputs, retryAttempts: "0" })).toThrow(ValidationError);
    expect(() => createConfig({ ...inputs, retryInitialDelayMs: "soon" })).toThrow(ValidationError);
  });
});

describe("parseRepository", () => {
  it("splits owner and repo", () => {
    expect(parseRepository("acme/factory")).toEqual({ owner: "acme", repo: "factory" });
  });

  it.each(["acme", "acme/", "acme/factory/extra"])("rejects %s", (value) => {
    expect(() => parseRepository(value)).toThrow(ValidationError);
  });
});
