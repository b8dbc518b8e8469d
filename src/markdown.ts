import { marked } from "marked";
import { ValidationError } from "./errors";
import { LinkConfig, ResolvedRelease, Row } from "./types";

const SUMMARY_START = "<!--Summary Block;";
const SUMMARY_END = "<!--Summary Block End;";
const MARKER_SUFFIX = "Don't modify/delete this comment.-->";

export type ReleaseSection = {
  release: ResolvedRelease;
  headers: string[];
  rows: Row[];
  summary: string;
  componentDir: string;
};

export function summaryStartMarker(tagName: string): string {
  return `${SUMMARY_START} ${tagName}; ${MARKER_SUFFIX}`;
}

export function summaryEndMarker(tagName: string): string {
  return `${SUMMARY_END} ${tagName}; ${MARKER_SUFFIX}`;
}

function markerTag(line: string): string {
  return (line.split(";")[1] ?? "").trim();
}

type ParserState = { kind: "outside" } | { kind: "inside"; tag: string; startLine: number; lines: string[] };

/**
 * Extracts the hand-written summary of every release from a previously
 * generated document, keyed by release tag name.
 */
export function parseSummaryBlocks(markdown: string): Map<string, string> {
  const blocks = new Map<string, string>();
  let state: ParserState = { kind: "outside" };
  const lines = markdown.split(/(?<=\n)/);
  for (const [i, line] of lines.entries()) {
    const lineNo = i + 1;
    if (line.startsWith(SUMMARY_START)) {
      if (state.kind === "inside") {
        throw new ValidationError(
          `Line ${lineNo}: summary block for '${markerTag(line)}' starts inside the block for '${state.tag}'`,
        );
      }
      state = { kind: "inside", tag: markerTag(line), startLine: lineNo, lines: [] };
    } else if (line.startsWith(SUMMARY_END)) {
      if (state.kind === "outside") {
        throw new ValidationError(`Line ${lineNo}: summary block end without a start`);
      }
      const tag = markerTag(line);
      if (tag !== state.tag) {
        throw new ValidationError(`Line ${lineNo}: summary block end for '${tag}' closes '${state.tag}'`);
      }
      blocks.set(state.tag, state.lines.join("").trimStart());
      state = { kind: "outside" };
    } else if (state.kind === "inside") {
      state.lines.push(line);
    }
  }
  if (state.kind === "inside") {
    throw new ValidationError(`Line ${state.startLine}: summary block for '${state.tag}' is never closed`);
  }
  return blocks;
}

function escapeCell(cell: string): string {
  return cell.replace(/\r?\n/g, " ").replace(/\|/g, "\\|");
}

export function renderTable(headers: string[], rows: Row[]): string {
  rows.forEach((row, i) => {
    if (row.length !== headers.length) {
      throw new ValidationError(
        `Markdown table row ${i + 1} has ${row.length} cell(s), expected ${headers.length} to match the headers`,
      );
    }
  });
  let text = `| ${headers.join(" | ")} |\n`;
  text += `|${headers.map((h) => "-".repeat(h.length + 2)).join("|")}|\n`;
  for (const row of rows) {
    text += `| ${row.map(escapeCell).join(" | ")} |\n`;
  }
  return text;
}

function repoUrl(links: LinkConfig): string {
  return `${links.githubUrl.replace(/\/$/, "")}/${links.repo.owner}/${links.repo.repo}`;
}

export function renderRelease(section: ReleaseSection, links: LinkConfig): string {
  const { tag, ancestor } = section.release;
  let summary = section.summary;
  if (summary && !summary.endsWith("\n")) summary += "\n";

  let text = "\n";
  text += `## \`${tag.version ?? ""}\` \`${tag.createdAt}\`\n\n`;
  text += `${summaryStartMarker(tag.name)}\n\n`;
  text += summary;
  text += `${summaryEndMarker(tag.name)}\n\n`;
  text += renderTable(section.headers, section.rows);
  text += "\n";
  text += `Previous Release: \`${ancestor.predecessor.name || "(initial commit)"}\`\n\n`;
  text += `[Compare changes on GitHub](${repoUrl(links)}/compare/${ancestor.predecessorCommitId}...${tag.commitId})\n\n`;
  text += `\n\`\`\`\n>> git diff ${ancestor.predecessorCommitId} ${tag.commitId} ${section.componentDir}\n\`\`\`\n`;
  return text;
}

export function renderComponentDocument(
  component: string,
  componentDir: string,
  sections: ReleaseSection[],
  links: LinkConfig,
): string {
  let text = `# [${component}](${repoUrl(links)}/tree/HEAD/${componentDir})\n\n`;
  for (const section of sections) {
    text += renderRelease(section, links);
  }
  return text;
}

export function renderHtml(markdown: string): string {
  return marked.parse(markdown) as string;
}
