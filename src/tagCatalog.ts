import * as core from "@actions/core";
import { DuplicateTagError, MalformedTagError, NoTagsFoundError, ValidationError } from "./errors";
import { Catalog, ReleaseChain, Tag, VcsService } from "./types";
import { isValidVersion } from "./version";

export const RELEASE_TAG_PREFIX = "release/";

export function releaseTagName(component: string, version: string): string {
  return `${RELEASE_TAG_PREFIX}${component}/${version}`;
}

export function parseReleaseTag(name: string): { component: string; version: string } {
  const parts = name.split("/");
  if (parts.length !== 3) {
    throw new MalformedTagError(name, "expected release/<component>/<version>");
  }
  const [prefix, component, version] = parts;
  if (`${prefix}/` !== RELEASE_TAG_PREFIX) {
    throw new MalformedTagError(name, `expected prefix '${RELEASE_TAG_PREFIX}'`);
  }
  if (!component) {
    throw new MalformedTagError(name, "empty component");
  }
  if (!isValidVersion(version)) {
    throw new MalformedTagError(name, `'${version}' is not a valid version format`);
  }
  return { component, version };
}

function rootTag(component: string, commitId: string, createdAt: string): Tag {
  return { name: "", component, version: undefined, commitId, createdAt };
}

function appendTag(chain: ReleaseChain, tag: Tag): void {
  if (chain.tags.some((t) => t.version === tag.version)) {
    throw new DuplicateTagError(chain.component, tag.version ?? "");
  }
  chain.tags.push(tag);
}

/**
 * Groups release tags into one chain per component, in first-seen order.
 * Every chain starts with a synthetic root tag on the repository's first commit.
 */
export async function buildCatalog(rawTags: string[], vcs: VcsService): Promise<Catalog> {
  if (!rawTags.length) {
    throw new NoTagsFoundError(`${RELEASE_TAG_PREFIX}<component>/<version>`);
  }
  const parsed = rawTags.map((name) => ({ name, ...parseReleaseTag(name) }));

  const firstCommitId = await vcs.firstCommitId();
  const firstCommitDate = await vcs.commitDate(firstCommitId);

  const catalog: Catalog = new Map();
  for (const { name, component, version } of parsed) {
    let chain = catalog.get(component);
    if (!chain) {
      chain = { component, tags: [rootTag(component, firstCommitId, firstCommitDate)] };
      catalog.set(component, chain);
    }
    const commitId = await vcs.resolveTag(name);
    const createdAt = await vcs.commitDate(commitId);
    appendTag(chain, { name, component, version, commitId, createdAt });
  }
  core.info(`Cataloged ${rawTags.length} release tag(s) across ${catalog.size} component(s)`);
  return catalog;
}

/**
 * Adds a release that has not been tagged yet, e.g. the one being cut from the current head.
 */
export function appendPendingRelease(
  catalog: Catalog,
  component: string,
  version: string,
  commitId: string,
  createdAt: string,
  firstCommit: { id: string; date: string },
): Tag {
  if (!component || component.includes("/")) {
    throw new ValidationError(`'${component}' is not a valid component name`);
  }
  if (!isValidVersion(version)) {
    throw new ValidationError(`'${version}' is not a valid version format`);
  }
  let chain = catalog.get(component);
  if (!chain) {
    chain = { component, tags: [rootTag(component, firstCommit.id, firstCommit.date)] };
    catalog.set(component, chain);
  }
  const tag: Tag = { name: releaseTagName(component, version), component, version, commitId, createdAt };
  appendTag(chain, tag);
  return tag;
}
