import * as core from "@actions/core";
import { TicketServiceError, errorMessage } from "./errors";
import { IssueRecord, TicketService } from "./types";

export type JiraAuth = {
  baseUrl: string;
  email: string;
  apiToken: string;
};

type Fields = Record<string, unknown>;

function isObject(value: unknown): value is Fields {
  return typeof value === "object" && value !== null;
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// `assignee`, `priority` etc. are objects, or null when unset.
function nestedName(fields: Fields, key: string): string {
  const value = fields[key];
  if (!isObject(value)) return "";
  return text(value.displayName) || text(value.name);
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function jiraBrowseUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/$/, "")}/browse/`;
}

export function parseIssue(issueId: string, data: unknown, browseUrl: string): IssueRecord {
  if (!isObject(data) || !isObject(data.fields)) {
    throw new TicketServiceError(issueId, "response has no 'fields' object");
  }
  const fields = data.fields;
  return {
    summary: text(fields.summary),
    assignee: nestedName(fields, "assignee"),
    reporter: nestedName(fields, "reporter"),
    priority: nestedName(fields, "priority"),
    status: nestedName(fields, "status"),
    url: `${browseUrl}${issueId}`,
  };
}

/**
 * Jira REST v2 issue lookups. Each call makes a single request; failures carry
 * `transient` so the caller can decide whether to retry.
 */
export class JiraTicketService implements TicketService {
  private readonly basic: string;

  constructor(private readonly auth: JiraAuth) {
    this.basic = Buffer.from(`${auth.email}:${auth.apiToken}`).toString("base64");
  }

  async getIssue(issueId: string): Promise<IssueRecord> {
    const endpoint = `${this.auth.baseUrl.replace(/\/$/, "")}/rest/api/2/issue/${encodeURIComponent(issueId)}`;
    core.debug(`GET ${endpoint}`);
    let res: Response;
    try {
      res = await fetch(endpoint, {
        headers: { Authorization: `Basic ${this.basic}`, Accept: "application/json" },
      });
    } catch (err) {
      throw new TicketServiceError(issueId, errorMessage(err), true);
    }
    if (!res.ok) {
      const t = await res.text();
      throw new TicketServiceError(issueId, `Jira API error ${res.status}: ${t}`, isTransientStatus(res.status));
    }
    return parseIssue(issueId, await res.json(), jiraBrowseUrl(this.auth.baseUrl));
  }
}
