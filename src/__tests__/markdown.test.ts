import { describe, expect, it } from "vitest";
import { TABLE_HEADERS } from "../assembleRows";
import { ValidationError } from "../errors";
import {
  ReleaseSection,
  parseSummaryBlocks,
  renderComponentDocument,
  renderHtml,
  renderRelease,
  renderTable,
  summaryEndMarker,
  summaryStartMarker,
} from "../markdown";
import { Tag } from "../types";
import { LINKS } from "./helpers";

const previous: Tag = {
  name: "release/scanner/1.0.0",
  component: "scanner",
  version: "1.0.0",
  commitId: "c1",
  createdAt: "2024-01-02",
};
const current: Tag = {
  name: "release/scanner/1.1.0",
  component: "scanner",
  version: "1.1.0",
  commitId: "c2",
  createdAt: "2024-01-03",
};

function section(summary: string): ReleaseSection {
  return {
    release: { tag: current, ancestor: { predecessor: previous, predecessorCommitId: "c1" } },
    headers: TABLE_HEADERS,
    rows: [["High", "FT-1", "Fix", "Dana", "[#5](u)", "[FT-1](j)"]],
    summary,
    componentDir: "components/scanner/",
  };
}

describe("renderTable", () => {
  it("renders headers, separator and escaped cells", () => {
    expect(renderTable(["A", "Bb"], [["1", "x|y"], ["2", "multi\nline"]])).toBe(
      "| A | Bb |\n|---|----|\n| 1 | x\\|y |\n| 2 | multi line |\n",
    );
  });

  it("rejects a row whose width differs from the headers", () => {
    expect(() => renderTable(["A", "B"], [["1", "2"], ["3"]])).toThrow(ValidationError);
  });
});

describe("renderRelease", () => {
  it("renders the release section", () => {
    expect(renderRelease(section(""), LINKS)).toBe(
      [
        "",
        "## `1.1.0` `2024-01-03`",
        "",
        "<!--Summary Block; release/scanner/1.1.0; Don't modify/delete this comment.-->",
        "",
        "<!--Summary Block End; release/scanner/1.1.0; Don't modify/delete this comment.-->",
        "",
        "| Priority | Ticket | Summary | Assignee | GitHub | Jira |",
        "|----------|--------|---------|----------|--------|------|",
        "| High | FT-1 | Fix | Dana | [#5](u) | [FT-1](j) |",
        "",
        "Previous Release: `release/scanner/1.0.0`",
        "",
        "[Compare changes on GitHub](https://github.com/acme/factory/compare/c1...c2)",
        "",
        "",
        "```",
        ">> git diff c1 c2 components/scanner/",
        "```",
        "",
      ].join("\n"),
    );
  });

  it("names the initial commit when there is no earlier release", () => {
    const root: Tag = { name: "", component: "scanner", version: undefined, commitId: "c0", createdAt: "2024-01-01" };
    const first = { ...section(""), release: { tag: previous, ancestor: { predecessor: root, predecessorCommitId: "c0" } } };
    expect(renderRelease(first, LINKS)).toContain("Previous Release: `(initial commit)`\n");
  });
});

describe("parseSummaryBlocks", () => {
  it("collects the text of every block keyed by tag", () => {
    const doc = [
      "# scanner",
      summaryStartMarker("release/scanner/1.1.0"),
      "",
      "Faster scans.",
      "",
      summaryEndMarker("release/scanner/1.1.0"),
      "| table |",
      summaryStartMarker("release/scanner/1.0.0"),
      "",
      summaryEndMarker("release/scanner/1.0.0"),
      "",
    ].join("\n");

    expect(parseSummaryBlocks(doc)).toEqual(
      new Map([
        ["release/scanner/1.1.0", "Faster scans.\n\n"],
        ["release/scanner/1.0.0", ""],
      ]),
    );
  });

  it("reproduces a summary block byte for byte on regeneration", () => {
    const summary = "Highlights:\n\n- faster scans\n- fewer crashes\n";
    const first = renderComponentDocument("scanner", "components/scanner/", [section(summary)], LINKS);
    const parsed = parseSummaryBlocks(first).get(current.name);

    expect(parsed).toBe(summary);
    const second = renderComponentDocument("scanner", "components/scanner/", [section(parsed ?? "")], LINKS);
    expect(second).toBe(first);
  });

  it("terminates a summary without a trailing newline", () => {
    const doc = renderRelease(section("One line"), LINKS);
    expect(parseSummaryBlocks(doc).get(current.name)).toBe("One line\n");
  });

  it("rejects a block that is never closed", () => {
    expect(() => parseSummaryBlocks(`${summaryStartMarker("release/a/1.0.0")}\ntext\n`)).toThrow(ValidationError);
  });

  it("rejects a block opened inside another", () => {
    const doc = [summaryStartMarker("release/a/1.0.0"), summaryStartMarker("release/a/1.1.0")].join("\n");
    expect(() => parseSummaryBlocks(doc)).toThrow(ValidationError);
  });

  it("rejects an end marker for a different tag", () => {
    const doc = [summaryStartMarker("release/a/1.0.0"), summaryEndMarker("release/a/1.1.0")].join("\n");
    expect(() => parseSummaryBlocks(doc)).toThrow(ValidationError);
  });

  it("rejects an end marker without a start", () => {
    expect(() => parseSummaryBlocks(summaryEndMarker("release/a/1.0.0"))).toThrow(ValidationError);
  });
});

describe("renderComponentDocument", () => {
  it("links the component directory in the heading", () => {
    const doc = renderComponentDocument("scanner", "components/scanner/", [], LINKS);
    expect(doc).toBe("# [scanner](https://github.com/acme/factory/tree/HEAD/components/scanner/)\n\n");
  });
});

describe("renderHtml", () => {
  it("converts markdown with marked", () => {
    expect(renderHtml("# Title")).toContain("<h1>Title</h1>");
  });
});
