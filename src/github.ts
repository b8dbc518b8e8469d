import * as core from "@actions/core";
import { getOctokit } from "@actions/github";
import { VcsQueryError, errorMessage } from "./errors";
import { RELEASE_TAG_PREFIX } from "./tagCatalog";
import { CommitRecord, RepoRef, TagOrder, VcsService } from "./types";
import { compareVersions } from "./version";

type Octokit = ReturnType<typeof getOctokit>;

type ResolvedRef = {
  commitId: string;
  // full ISO timestamp, used to order tags by creation
  createdAt: string;
};

const PAGE_SIZE = 100;
const NO_COMMON_ANCESTOR = /no common ancestor/i;

export function parseLastPage(link: string | undefined): number | undefined {
  const match = (link ?? "").match(/[?&]page=(\d+)[^>]*>;\s*rel="last"/);
  return match ? parseInt(match[1], 10) : undefined;
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function shortDate(iso: string | undefined): string {
  return (iso ?? "").slice(0, 10);
}

function versionOf(tagName: string): { component: string; version: string } {
  const [, component = "", version = ""] = tagName.split("/");
  return { component, version };
}

/**
 * VcsService backed by the GitHub REST API. `ref` is the branch or sha
 * treated as the head of the repository.
 */
export class GithubVcsService implements VcsService {
  private readonly octokit: Octokit;
  private readonly refs = new Map<string, ResolvedRef>();

  constructor(
    token: string,
    private readonly repo: RepoRef,
    private readonly ref: string,
  ) {
    this.octokit = getOctokit(token);
  }

  private async query<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof VcsQueryError) throw err;
      throw new VcsQueryError(operation, errorMessage(err));
    }
  }

  private async resolveRef(name: string, sha: string, type: string): Promise<ResolvedRef> {
    let resolved: ResolvedRef;
    if (type === "tag") {
      // annotated tag: dated by the tagger
      const { data } = await this.octokit.rest.git.getTag({ ...this.repo, tag_sha: sha });
      resolved = { commitId: data.object.sha, createdAt: data.tagger.date };
    } else {
      resolved = { commitId: sha, createdAt: await this.commitTimestamp(sha) };
    }
    this.refs.set(name, resolved);
    return resolved;
  }

  async listTags(order: TagOrder): Promise<string[]> {
    return this.query("listTags", async () => {
      const refs = await this.octokit.paginate(this.octokit.rest.git.listMatchingRefs, {
        ...this.repo,
        ref: `tags/${RELEASE_TAG_PREFIX}`,
        per_page: PAGE_SIZE,
      });
      const tags: { name: string; createdAt: string }[] = [];
      for (const ref of refs) {
        const name = ref.ref.replace(/^refs\/tags\//, "");
        const resolved = this.refs.get(name) ?? (await this.resolveRef(name, ref.object.sha, ref.object.type));
        tags.push({ name, createdAt: resolved.createdAt });
      }
      core.info(`Found ${tags.length} release tag(s) in ${this.repo.owner}/${this.repo.repo}`);
      if (order === "created") {
        tags.sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));
      } else {
        tags.sort((a, b) => {
          const left = versionOf(a.name);
          const right = versionOf(b.name);
          return left.component.localeCompare(right.component) || compareVersions(left.version, right.version);
        });
      }
      return tags.map((t) => t.name);
    });
  }

  async firstCommitId(): Promise<string> {
    return this.query("firstCommitId", async () => {
      const first = await this.octokit.rest.repos.listCommits({ ...this.repo, sha: this.ref, per_page: 1 });
      const lastPage = parseLastPage(first.headers.link);
      const page = lastPage
        ? (await this.octokit.rest.repos.listCommits({ ...this.repo, sha: this.ref, per_page: 1, page: lastPage })).data
        : first.data;
      const commit = page[0];
      if (!commit) {
        throw new VcsQueryError("firstCommitId", `no commits on ${this.ref}`);
      }
      return commit.sha;
    });
  }

  async latestCommitId(): Promise<string> {
    return this.query("latestCommitId", async () => {
      const { data } = await this.octokit.rest.repos.getCommit({ ...this.repo, ref: this.ref, per_page: 1 });
      return data.sha;
    });
  }

  async resolveTag(tagName: string): Promise<string> {
    const cached = this.refs.get(tagName);
    if (cached) return cached.commitId;
    return this.query("resolveTag", async () => {
      const { data } = await this.octokit.rest.git.getRef({ ...this.repo, ref: `tags/${tagName}` });
      return (await this.resolveRef(tagName, data.object.sha, data.object.type)).commitId;
    });
  }

  async lowestCommonAncestor(commitA: string, commitB: string): Promise<string | undefined> {
    return this.query("lowestCommonAncestor", async () => {
      try {
        const { data } = await this.octokit.rest.repos.compareCommitsWithBasehead({
          ...this.repo,
          basehead: `${commitA}...${commitB}`,
          per_page: 1,
        });
        return data.merge_base_commit.sha;
      } catch (err) {
        // Unrelated histories and unknown commits both answer 404; only the former has no merge base.
        if (httpStatus(err) === 404 && NO_COMMON_ANCESTOR.test(errorMessage(err))) return undefined;
        throw err;
      }
    });
  }

  async logBetween(from: string, to: string): Promise<CommitRecord[]> {
    return this.query("logBetween", async () => {
      const records: CommitRecord[] = [];
      for (let page = 1; ; page++) {
        const { data } = await this.octokit.rest.repos.compareCommitsWithBasehead({
          ...this.repo,
          basehead: `${from}...${to}`,
          per_page: PAGE_SIZE,
          page,
        });
        for (const c of data.commits) {
          records.push({
            date: shortDate(c.commit.committer?.date ?? c.commit.author?.date),
            id: c.sha,
            message: c.commit.message,
          });
        }
        if (data.commits.length < PAGE_SIZE || records.length >= data.total_commits) break;
      }
      // GitHub lists the range oldest first.
      return records.reverse();
    });
  }

  async changedPaths(commitId: string): Promise<string[]> {
    return this.query("changedPaths", async () => {
      const paths: string[] = [];
      for (let page = 1; ; page++) {
        const { data } = await this.octokit.rest.repos.getCommit({ ...this.repo, ref: commitId, per_page: PAGE_SIZE, page });
        const files = data.files ?? [];
        paths.push(...files.map((f) => f.filename));
        if (files.length < PAGE_SIZE) break;
      }
      return paths;
    });
  }

  private async commitTimestamp(commitId: string): Promise<string> {
    const { data } = await this.octokit.rest.repos.getCommit({ ...this.repo, ref: commitId, per_page: 1 });
    return data.commit.committer?.date ?? data.commit.author?.date ?? "";
  }

  async commitDate(commitId: string): Promise<string> {
    return this.query("commitDate", async () => shortDate(await this.commitTimestamp(commitId)));
  }
}
