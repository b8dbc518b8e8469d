import * as core from "@actions/core";
import { NoAncestorFoundError } from "./errors";
import { Catalog, ReleaseChain, ResolvedRelease, Tag, VcsService } from "./types";

/*
 * Releases can fork: a patch may be cut from an older release rather than the
 * latest one.
 *
 *   ----*--------------*-------------------------------------- main
 *       ^              ^            \               \
 *     1.1.0          1.1.1           ----*           ----*
 *                                        ^               ^
 *                                      1.1.3           1.1.4
 *
 * Both 1.1.3 and 1.1.4 descend from 1.1.1. For each tag we walk the earlier
 * tags newest first and take the first merge base that is itself a tagged
 * commit. Criss-cross merges can fool this; that is accepted.
 */

async function resolveTag(
  chain: ReleaseChain,
  index: number,
  known: Map<string, Tag>,
  vcs: VcsService,
): Promise<ResolvedRelease> {
  const tag = chain.tags[index];
  for (let j = index - 1; j >= 0; j--) {
    const lca = await vcs.lowestCommonAncestor(tag.commitId, chain.tags[j].commitId);
    const predecessor = lca === undefined ? undefined : known.get(lca);
    if (predecessor) {
      core.debug(`${tag.name} -> ${predecessor.name || "(root)"} via ${lca}`);
      return Object.freeze({
        tag,
        ancestor: Object.freeze({ predecessor, predecessorCommitId: predecessor.commitId }),
      });
    }
  }
  throw new NoAncestorFoundError(chain.component, tag.name);
}

export async function resolveChain(chain: ReleaseChain, vcs: VcsService): Promise<ResolvedRelease[]> {
  const resolved: ResolvedRelease[] = [];
  // commit id -> tag, over the tags chained before the one being resolved
  const known = new Map<string, Tag>();
  for (let i = 1; i < chain.tags.length; i++) {
    const previous = chain.tags[i - 1];
    known.set(previous.commitId, previous);
    resolved.push(await resolveTag(chain, i, known, vcs));
  }
  return resolved;
}

export async function resolveCatalog(
  catalog: Catalog,
  vcs: VcsService,
  components: string[] = [...catalog.keys()],
): Promise<Map<string, ResolvedRelease[]>> {
  const result = new Map<string, ResolvedRelease[]>();
  for (const component of components) {
    const chain = catalog.get(component);
    if (!chain) continue;
    result.set(component, await resolveChain(chain, vcs));
  }
  return result;
}
