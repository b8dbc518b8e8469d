import { CommitGraph, GraphCommit, GraphTag, GraphVcsService } from "../commitGraph";
import { IssueRecord, LinkConfig, TicketService } from "../types";

export const LINKS: LinkConfig = {
  githubUrl: "https://github.com",
  repo: { owner: "acme", repo: "factory" },
  jiraBrowseUrl: "https://jira.example.com/browse/",
};

export function commit(
  id: string,
  parents: string[],
  date: string,
  message = `commit ${id}`,
  paths: string[] = [],
): GraphCommit {
  return { id, parents, date, message, paths };
}

export function tag(name: string, commitId: string, createdAt: string): GraphTag {
  return { name, commitId, createdAt };
}

export function graphVcs(commits: GraphCommit[], tags: GraphTag[] = []): GraphVcsService {
  return new GraphVcsService(new CommitGraph(commits), tags);
}

export function issue(id: string, fields: Partial<IssueRecord> = {}): IssueRecord {
  return {
    summary: `Summary of ${id}`,
    assignee: "",
    reporter: "",
    priority: "",
    status: "Open",
    url: `${LINKS.jiraBrowseUrl}${id}`,
    ...fields,
  };
}

export class FakeTicketService implements TicketService {
  readonly calls: string[] = [];

  constructor(private readonly issues: Record<string, IssueRecord>) {}

  async getIssue(issueId: string): Promise<IssueRecord> {
    this.calls.push(issueId);
    const found = this.issues[issueId];
    if (!found) {
      throw new Error(`no issue ${issueId}`);
    }
    return found;
  }
}
