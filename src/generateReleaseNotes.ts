import * as core from "@actions/core";
import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import { resolveCatalog } from "./ancestry";
import { TABLE_HEADERS, assembleRows } from "./assembleRows";
import { componentDirPath, scopeCommits } from "./commitScope";
import { ValidationError } from "./errors";
import { ReleaseSection, parseSummaryBlocks, renderComponentDocument, renderHtml } from "./markdown";
import { RELEASE_TAG_PREFIX, appendPendingRelease, buildCatalog } from "./tagCatalog";
import {
  Catalog,
  GenerateOptions,
  GeneratedDocument,
  IssueRecord,
  ReleaseNotesConfig,
  ResolvedRelease,
  Tag,
  Ticket,
} from "./types";

export const RELEASE_NOTES_FILE = "release-notes.md";

function ensureDirSync(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function releaseNotesPath(config: ReleaseNotesConfig, component: string): string {
  return path.resolve(config.workspace, config.componentRootPath, component, RELEASE_NOTES_FILE);
}

export function htmlPath(markdownPath: string): string {
  return markdownPath.replace(/\.md$/, ".html");
}

async function readPriorSummaries(file: string): Promise<Map<string, string>> {
  if (!fs.existsSync(file)) {
    return new Map();
  }
  return parseSummaryBlocks(await fsp.readFile(file, "utf8"));
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

// The release being cut is not tagged yet, so its notes get a leading row for the release commit itself.
function pendingReleaseTicket(tag: Tag): Ticket {
  return { date: tag.createdAt, commitId: "", title: `Release ${tag.name}`, ft: "" };
}

function selectComponents(catalog: Catalog, options: GenerateOptions): string[] {
  const requested = options.components ?? [...catalog.keys()];
  const pending = options.pendingRelease?.component;
  const selected = pending && !requested.includes(pending) ? [...requested, pending] : requested;
  for (const component of selected) {
    if (!catalog.has(component)) {
      throw new ValidationError(`Unknown component '${component}'; known: ${[...catalog.keys()].join(", ")}`);
    }
  }
  return selected;
}

async function renderComponent(
  config: ReleaseNotesConfig,
  component: string,
  releases: ResolvedRelease[],
  pendingTag: Tag | undefined,
  lookups: Map<string, IssueRecord>,
): Promise<GeneratedDocument> {
  const markdownPath = releaseNotesPath(config, component);
  const summaries = await readPriorSummaries(markdownPath);
  const componentDir = componentDirPath(config.componentRootPath, component);

  const sections: ReleaseSection[] = [];
  for (const release of [...releases].reverse()) {
    core.info(`"${release.tag.name}" release notes is generating...`);
    const tickets = await scopeCommits(
      release.ancestor.predecessorCommitId,
      release.tag.commitId,
      component,
      config.vcsService,
      config.componentRootPath,
    );
    if (release.tag === pendingTag) {
      tickets.unshift(pendingReleaseTicket(release.tag));
    }
    const rows = await assembleRows(tickets, config.ticketService, config.retryPolicy, config.links, lookups);
    sections.push({
      release,
      headers: TABLE_HEADERS,
      rows,
      summary: summaries.get(release.tag.name) ?? "",
      componentDir,
    });
  }

  const markdown = renderComponentDocument(component, componentDir, sections, config.links);
  return {
    component,
    markdownPath,
    markdown,
    html: config.htmlOutput ? renderHtml(markdown) : undefined,
    releases: sections.length,
  };
}

/**
 * Builds the release notes document of every selected component. Nothing is
 * written unless every document was generated.
 */
export async function generateReleaseNotes(
  config: ReleaseNotesConfig,
  options: GenerateOptions = {},
): Promise<GeneratedDocument[]> {
  const vcs = config.vcsService;
  const tagNames = (await vcs.listTags("created")).filter((name) => name.startsWith(RELEASE_TAG_PREFIX));
  const catalog = await buildCatalog(tagNames, vcs);

  let pendingTag: Tag | undefined;
  if (options.pendingRelease) {
    const { component, version } = options.pendingRelease;
    const firstId = await vcs.firstCommitId();
    pendingTag = appendPendingRelease(
      catalog,
      component,
      version,
      await vcs.latestCommitId(),
      options.pendingRelease.date ?? today(),
      { id: firstId, date: await vcs.commitDate(firstId) },
    );
    core.info(`Planning ${pendingTag.name} at ${pendingTag.commitId}`);
  }

  const selected = selectComponents(catalog, options);
  const resolved = await resolveCatalog(catalog, vcs, selected);

  const lookups = new Map<string, IssueRecord>();
  const documents: GeneratedDocument[] = [];
  for (const component of selected) {
    documents.push(await renderComponent(config, component, resolved.get(component) ?? [], pendingTag, lookups));
  }

  for (const doc of documents) {
    ensureDirSync(path.dirname(doc.markdownPath));
    await fsp.writeFile(doc.markdownPath, doc.markdown, "utf8");
    core.info(`"${doc.markdownPath}" file is generated`);
    if (doc.html !== undefined) {
      await fsp.writeFile(htmlPath(doc.markdownPath), doc.html, "utf8");
    }
  }
  return documents;
}
