import * as core from "@actions/core";
import { TicketServiceError, errorMessage } from "./errors";
import { withRetry } from "./retry";
import { EnrichedTicket, IssueRecord, LinkConfig, RetryPolicy, Row, Ticket, TicketService } from "./types";

export const TABLE_HEADERS = ["Priority", "Ticket", "Summary", "Assignee", "GitHub", "Jira"];

function isTransient(err: unknown): boolean {
  // Anything that is not a classified ticket service failure is treated as permanent.
  return err instanceof TicketServiceError && err.transient;
}

async function lookup(issueId: string, service: TicketService, policy: RetryPolicy): Promise<IssueRecord> {
  try {
    return await withRetry(`Jira lookup ${issueId}`, () => service.getIssue(issueId), policy, isTransient);
  } catch (err) {
    if (err instanceof TicketServiceError) throw err;
    throw new TicketServiceError(issueId, errorMessage(err));
  }
}

/**
 * Attaches the tracker record to every ticket that references an issue.
 * Each distinct issue id is looked up once; one failed lookup fails the batch.
 */
export async function enrichTickets(
  tickets: Ticket[],
  service: TicketService,
  policy: RetryPolicy,
  cache: Map<string, IssueRecord> = new Map(),
): Promise<EnrichedTicket[]> {
  const enriched: EnrichedTicket[] = [];
  for (const ticket of tickets) {
    if (!ticket.ft) {
      enriched.push({ ...ticket });
      continue;
    }
    let issue = cache.get(ticket.ft);
    if (!issue) {
      core.info(`Fetching ${ticket.ft}...`);
      issue = await lookup(ticket.ft, service, policy);
      cache.set(ticket.ft, issue);
    }
    enriched.push({ ...ticket, issue });
  }
  return enriched;
}

function githubLink(ticket: EnrichedTicket, links: LinkConfig): string {
  const base = `${links.githubUrl.replace(/\/$/, "")}/${links.repo.owner}/${links.repo.repo}`;
  if (ticket.pullRequestId) {
    return `[#${ticket.pullRequestId}](${base}/pull/${ticket.pullRequestId})`;
  }
  if (ticket.commitId) {
    return `[${ticket.commitId.slice(0, 7)}](${base}/commit/${ticket.commitId})`;
  }
  return "";
}

/**
 * The Summary column prefers the tracker summary and falls back to the commit
 * title. Priority, Assignee and the Jira link only come from the tracker.
 */
export function toRow(ticket: EnrichedTicket, links: LinkConfig): Row {
  const issue = ticket.issue;
  return [
    issue?.priority ?? "",
    ticket.ft,
    issue?.summary || ticket.title,
    issue?.assignee ?? "",
    githubLink(ticket, links),
    ticket.ft ? `[${ticket.ft}](${issue?.url || `${links.jiraBrowseUrl}${ticket.ft}`})` : "",
  ];
}

export async function assembleRows(
  tickets: Ticket[],
  service: TicketService,
  policy: RetryPolicy,
  links: LinkConfig,
  cache?: Map<string, IssueRecord>,
): Promise<Row[]> {
  const enriched = await enrichTickets(tickets, service, policy, cache);
  return enriched.map((ticket) => toRow(ticket, links));
}
