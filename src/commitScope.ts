import * as core from "@actions/core";
import * as path from "path";
import { Ticket, VcsService } from "./types";

const FT_REGEX = /[A-Z]{2}-[0-9]+/;
const PULL_ID_REGEX = / #([0-9]+) /;

export function componentDirPath(componentRootPath: string, component: string): string {
  return `${path.posix.join(componentRootPath, component)}/`;
}

export function extractIssueId(message: string): string {
  return message.match(FT_REGEX)?.[0] ?? "";
}

export function extractPullRequestId(message: string): string | undefined {
  return message.match(PULL_ID_REGEX)?.[1];
}

/**
 * Tickets for the commits after `predecessorCommitId` up to and including
 * `tagCommitId` that changed at least one file under the component directory.
 */
export async function scopeCommits(
  predecessorCommitId: string,
  tagCommitId: string,
  component: string,
  vcs: VcsService,
  componentRootPath: string,
): Promise<Ticket[]> {
  const dirPath = componentDirPath(componentRootPath, component);
  const commits = await vcs.logBetween(predecessorCommitId, tagCommitId);
  const tickets: Ticket[] = [];
  for (const commit of commits) {
    const paths = await vcs.changedPaths(commit.id);
    if (!paths.some((p) => p.startsWith(dirPath))) {
      continue;
    }
    const title = commit.message.split("\n")[0].trim();
    const ticket: Ticket = { date: commit.date, commitId: commit.id, title, ft: extractIssueId(title) };
    const pullRequestId = extractPullRequestId(title);
    if (pullRequestId) ticket.pullRequestId = pullRequestId;
    tickets.push(ticket);
  }
  core.info(`${component}: ${tickets.length} of ${commits.length} commit(s) touch ${dirPath}`);
  return tickets;
}
