export type RepoRef = {
  owner: string;
  repo: string;
};

export type Tag = {
  // Full tag name, e.g. release/scanner/1.2.0. Empty for the synthetic root.
  name: string;
  component: string;
  version: string | undefined;
  commitId: string;
  createdAt: string;
};

// Index 0 is always the synthetic root tag.
export type ReleaseChain = {
  component: string;
  tags: Tag[];
};

export type Catalog = Map<string, ReleaseChain>;

export type AncestorLink = {
  readonly predecessor: Tag;
  readonly predecessorCommitId: string;
};

export type ResolvedRelease = {
  readonly tag: Tag;
  readonly ancestor: AncestorLink;
};

export type CommitRecord = {
  date: string;
  id: string;
  message: string;
};

export type TagOrder = "created" | "version";

export interface VcsService {
  /** Release tag names, oldest first for "created", ascending for "version". */
  listTags(order: TagOrder): Promise<string[]>;
  firstCommitId(): Promise<string>;
  latestCommitId(): Promise<string>;
  resolveTag(tagName: string): Promise<string>;
  /** Undefined when the two commits share no history. */
  lowestCommonAncestor(commitA: string, commitB: string): Promise<string | undefined>;
  /** Commits reachable from `to` but not from `from`, newest first. */
  logBetween(from: string, to: string): Promise<CommitRecord[]>;
  changedPaths(commitId: string): Promise<string[]>;
  commitDate(commitId: string): Promise<string>;
}

export type IssueRecord = {
  summary: string;
  assignee: string;
  reporter: string;
  priority: string;
  status: string;
  url: string;
};

export interface TicketService {
  getIssue(issueId: string): Promise<IssueRecord>;
}

export type Ticket = {
  date: string;
  commitId: string;
  title: string;
  // Issue key such as FT-1778, or "" when the commit references none.
  ft: string;
  pullRequestId?: string;
};

export type EnrichedTicket = Ticket & {
  issue?: IssueRecord;
};

export type Row = string[];

export type RetryPolicy = {
  attempts: number;
  initialDelayMs: number;
};

export type LinkConfig = {
  githubUrl: string;
  repo: RepoRef;
  jiraBrowseUrl: string;
};

export type ReleaseNotesConfig = {
  vcsService: VcsService;
  ticketService: TicketService;
  componentRootPath: string;
  retryPolicy: RetryPolicy;
  links: LinkConfig;
  // Directory the component root path is resolved against.
  workspace: string;
  htmlOutput: boolean;
};

export type PendingRelease = {
  component: string;
  version: string;
  // YYYY-MM-DD, defaults to today.
  date?: string;
};

export type GenerateOptions = {
  // Undefined means every cataloged component.
  components?: string[];
  pendingRelease?: PendingRelease;
};

export type GeneratedDocument = {
  component: string;
  markdownPath: string;
  markdown: string;
  html?: string;
  releases: number;
};
