import * as core from "@actions/core";
import * as github from "@actions/github";
import { ValidationError } from "./errors";
import { GithubVcsService } from "./github";
import { JiraTicketService, jiraBrowseUrl } from "./jira";
import { DEFAULT_RETRY_POLICY } from "./retry";
import { GenerateOptions, ReleaseNotesConfig, RepoRef } from "./types";

export type ActionInputs = {
  githubToken: string;
  repository: string;
  ref: string;
  githubServerUrl: string;
  jiraBaseUrl: string;
  jiraEmail: string;
  jiraApiToken: string;
  componentRootPath: string;
  components: string;
  releaseComponent: string;
  releaseVersion: string;
  retryAttempts: string;
  retryInitialDelayMs: string;
  htmlOutput: string;
  workspace: string;
};

function input(name: string, envName: string, fallback = ""): string {
  return core.getInput(name) || process.env[envName] || fallback;
}

export function readInputs(): ActionInputs {
  return {
    githubToken: input("github-token", "GITHUB_TOKEN"),
    repository: input("repository", "GITHUB_REPOSITORY"),
    ref: input("ref", "RELEASE_NOTES_REF", github.context.sha || "HEAD"),
    githubServerUrl: input("github-server-url", "GITHUB_SERVER_URL", "https://github.com"),
    jiraBaseUrl: input("jira-base-url", "JIRA_BASE_URL"),
    jiraEmail: input("jira-email", "JIRA_EMAIL"),
    jiraApiToken: input("jira-api-token", "JIRA_API_TOKEN"),
    componentRootPath: input("component-root-path", "COMPONENT_ROOT_PATH", "components"),
    components: input("components", "COMPONENTS"),
    releaseComponent: input("release-component", "RELEASE_COMPONENT"),
    releaseVersion: input("release-version", "RELEASE_VERSION"),
    retryAttempts: input("retry-attempts", "RETRY_ATTEMPTS", String(DEFAULT_RETRY_POLICY.attempts)),
    retryInitialDelayMs: input(
      "retry-initial-delay-ms",
      "RETRY_INITIAL_DELAY_MS",
      String(DEFAULT_RETRY_POLICY.initialDelayMs),
    ),
    htmlOutput: input("html-output", "HTML_OUTPUT", "false"),
    workspace: input("workspace", "GITHUB_WORKSPACE", process.cwd()),
  };
}

export function parseRepository(value: string): RepoRef {
  const [owner, repo, ...rest] = value.split("/");
  if (!owner || !repo || rest.length) {
    throw new ValidationError(`Invalid repository '${value}', expected <owner>/<repo>`);
  }
  return { owner, repo };
}

function parseCount(name: string, value: string, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new ValidationError(`Input '${name}' must be an integer >= ${min}, got '${value}'`);
  }
  return n;
}

function required(value: string, name: string, envName: string): string {
  if (!value) {
    throw new Error(`Input required and not supplied: ${name} (or ${envName})`);
  }
  return value;
}

export function createConfig(inputs: ActionInputs): { config: ReleaseNotesConfig; options: GenerateOptions } {
  const githubToken = required(inputs.githubToken, "github-token", "GITHUB_TOKEN");
  const repo = parseRepository(required(inputs.repository, "repository", "GITHUB_REPOSITORY"));
  const jiraBaseUrl = required(inputs.jiraBaseUrl, "jira-base-url", "JIRA_BASE_URL");
  const jiraEmail = required(inputs.jiraEmail, "jira-email", "JIRA_EMAIL");
  const jiraApiToken = required(inputs.jiraApiToken, "jira-api-token", "JIRA_API_TOKEN");

  if (Boolean(inputs.releaseComponent) !== Boolean(inputs.releaseVersion)) {
    throw new ValidationError("Inputs 'release-component' and 'release-version' must be supplied together");
  }

  const config: ReleaseNotesConfig = {
    vcsService: new GithubVcsService(githubToken, repo, inputs.ref),
    ticketService: new JiraTicketService({ baseUrl: jiraBaseUrl, email: jiraEmail, apiToken: jiraApiToken }),
    componentRootPath: inputs.componentRootPath.replace(/\/+$/, ""),
    retryPolicy: {
      attempts: parseCount("retry-attempts", inputs.retryAttempts, 1),
      initialDelayMs: parseCount("retry-initial-delay-ms", inputs.retryInitialDelayMs, 0),
    },
    links: {
      githubUrl: inputs.githubServerUrl,
      repo,
      jiraBrowseUrl: jiraBrowseUrl(jiraBaseUrl),
    },
    workspace: inputs.workspace,
    htmlOutput: inputs.htmlOutput.toLowerCase() === "true",
  };

  const components = inputs.components
    .split(",")
    .map((c) => c.trim())
    .filter(Boolean);
  const options: GenerateOptions = {
    components: components.length && !components.includes("all") ? components : undefined,
    pendingRelease: inputs.releaseComponent
      ? { component: inputs.releaseComponent, version: inputs.releaseVersion }
      : undefined,
  };
  return { config, options };
}
