import { ValidationError, VcsQueryError } from "./errors";
import { compareVersions } from "./version";
import { CommitRecord, TagOrder, VcsService } from "./types";

export type GraphCommit = {
  id: string;
  parents: string[];
  date: string;
  message: string;
  paths: string[];
};

export type GraphTag = {
  name: string;
  commitId: string;
  createdAt: string;
};

/**
 * Immutable commit graph. Commits must be added after their parents, so
 * insertion order is a topological order.
 */
export class CommitGraph {
  private readonly commits: ReadonlyMap<string, GraphCommit>;
  private readonly order: readonly string[];
  private readonly ancestorCache = new Map<string, ReadonlySet<string>>();

  constructor(commits: GraphCommit[]) {
    const byId = new Map<string, GraphCommit>();
    for (const commit of commits) {
      if (byId.has(commit.id)) {
        throw new ValidationError(`Duplicate commit ${commit.id}`);
      }
      for (const parent of commit.parents) {
        if (!byId.has(parent)) {
          throw new ValidationError(`Commit ${commit.id} refers to unknown parent ${parent}`);
        }
      }
      byId.set(commit.id, Object.freeze({ ...commit, parents: [...commit.parents], paths: [...commit.paths] }));
    }
    this.commits = byId;
    this.order = commits.map((c) => c.id);
  }

  get size(): number {
    return this.order.length;
  }

  commit(id: string): GraphCommit {
    const commit = this.commits.get(id);
    if (!commit) {
      throw new VcsQueryError("commit", `unknown commit ${id}`);
    }
    return commit;
  }

  roots(): string[] {
    return this.order.filter((id) => this.commit(id).parents.length === 0);
  }

  head(): string {
    const last = this.order[this.order.length - 1];
    if (last === undefined) {
      throw new VcsQueryError("head", "the graph has no commits");
    }
    return last;
  }

  /** All ancestors of `id`, including itself. */
  ancestors(id: string): ReadonlySet<string> {
    const cached = this.ancestorCache.get(id);
    if (cached) return cached;
    const seen = new Set<string>();
    const stack = [id];
    while (stack.length) {
      const current = stack.pop();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      stack.push(...this.commit(current).parents);
    }
    this.ancestorCache.set(id, seen);
    return seen;
  }

  isAncestor(ancestor: string, descendant: string): boolean {
    return this.ancestors(descendant).has(ancestor);
  }

  /**
   * Best common ancestor: a common ancestor that is not an ancestor of another
   * common ancestor. Latest date, then highest id, picks among several.
   */
  lowestCommonAncestor(a: string, b: string): string | undefined {
    const fromB = this.ancestors(b);
    const common = [...this.ancestors(a)].filter((id) => fromB.has(id));
    const best = common.filter(
      (candidate) => !common.some((other) => other !== candidate && this.isAncestor(candidate, other)),
    );
    best.sort((x, y) => {
      const byDate = this.commit(y).date.localeCompare(this.commit(x).date);
      return byDate !== 0 ? byDate : y.localeCompare(x);
    });
    return best[0];
  }

  /** Commits reachable from `to` and not from `from`, newest first. */
  logBetween(from: string, to: string): GraphCommit[] {
    const excluded = this.ancestors(from);
    const included = this.ancestors(to);
    return this.order
      .filter((id) => included.has(id) && !excluded.has(id))
      .reverse()
      .map((id) => this.commit(id));
  }
}

/**
 * VcsService over an in-process CommitGraph and a list of tags in creation order.
 */
export class GraphVcsService implements VcsService {
  constructor(
    private readonly graph: CommitGraph,
    private readonly tags: GraphTag[],
    private readonly headId: string = graph.head(),
  ) {
    for (const tag of tags) {
      graph.commit(tag.commitId);
    }
  }

  async listTags(order: TagOrder): Promise<string[]> {
    const sorted = [...this.tags];
    if (order === "created") {
      sorted.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    } else {
      sorted.sort((a, b) => {
        const [, componentA = "", versionA = ""] = a.name.split("/");
        const [, componentB = "", versionB = ""] = b.name.split("/");
        return componentA.localeCompare(componentB) || compareVersions(versionA, versionB);
      });
    }
    return sorted.map((t) => t.name);
  }

  async firstCommitId(): Promise<string> {
    const [first] = this.graph.roots();
    if (first === undefined) {
      throw new VcsQueryError("firstCommitId", "the graph has no commits");
    }
    return first;
  }

  async latestCommitId(): Promise<string> {
    return this.headId;
  }

  async resolveTag(tagName: string): Promise<string> {
    const tag = this.tags.find((t) => t.name === tagName);
    if (!tag) {
      throw new VcsQueryError("resolveTag", `unknown tag ${tagName}`);
    }
    return tag.commitId;
  }

  async lowestCommonAncestor(commitA: string, commitB: string): Promise<string | undefined> {
    return this.graph.lowestCommonAncestor(commitA, commitB);
  }

  async logBetween(from: string, to: string): Promise<CommitRecord[]> {
    return this.graph.logBetween(from, to).map((c) => ({ date: c.date, id: c.id, message: c.message }));
  }

  async changedPaths(commitId: string): Promise<string[]> {
    return [...this.graph.commit(commitId).paths];
  }

  async commitDate(commitId: string): Promise<string> {
    return this.graph.commit(commitId).date;
  }
}
