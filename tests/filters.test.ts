// CHANGE: Verify entry filter stages, their order and their defaults.
// WHY: Filters must be stable, composable and inclusive at their bounds.
// SOURCE: internal reasoning

import { describe, expect, it } from "vitest";
import {
  applyEntryFilters,
  extensionOf,
  filterByCommitDate,
  filterByExcludes,
  filterByExtension,
  filterByPattern,
  filterBySize,
  filterByType,
  normalizeExtension
} from "../src/filters.js";
import { FileType, TreeEntry } from "../src/types.js";
import { searchOptions } from "./fakes.js";

function entry(path: string, type: FileType = "file", size = 10): TreeEntry {
  return { path, mode: "100644", sha: `sha-${path}`, size, type };
}

const entries: readonly TreeEntry[] = [
  entry("README.md", "file", 120),
  entry("main.go", "file", 400),
  entry("cmd", "directory", 0),
  entry("cmd/tool.go", "file", 1024),
  entry("scripts/run.sh", "executable", 60),
  entry("vendor/lib.go", "file", 2048),
  entry("Makefile", "file", 80)
];

const paths = (list: readonly TreeEntry[]): string[] => list.map(item => item.path);

describe("normalizeExtension", () => {
  it.each([
    ["go", ".go"],
    [".go", ".go"],
    ["..md", ".md"]
  ])("normalizes %s to %s", (input, expected) => {
    expect(normalizeExtension(input)).toBe(expected);
  });
});

describe("extensionOf", () => {
  it("uses the last dot of the basename", () => {
    expect(extensionOf("dist/app.min.js")).toBe(".js");
    expect(extensionOf("v1.2/Makefile")).toBe("");
  });
});

describe("individual stages", () => {
  it("keeps everything when no type is selected", () => {
    expect(filterByType(entries, [])).toEqual(entries);
  });

  it("filters by any of the selected types", () => {
    expect(paths(filterByType(entries, ["directory", "executable"]))).toEqual(["cmd", "scripts/run.sh"]);
  });

  it("matches extensions with or without the leading dot", () => {
    expect(paths(filterByExtension(entries, ["go", ".md"], false))).toEqual([
      "README.md",
      "main.go",
      "cmd/tool.go",
      "vendor/lib.go"
    ]);
  });

  it("never matches entries without an extension", () => {
    expect(paths(filterByExtension(entries, [""], false))).toEqual([]);
  });

  it("compares extensions case-insensitively on request", () => {
    const upper = [entry("LOGO.PNG")];
    expect(filterByExtension(upper, ["png"], false)).toEqual([]);
    expect(paths(filterByExtension(upper, ["png"], true))).toEqual(["LOGO.PNG"]);
  });

  it("treats size bounds as inclusive", () => {
    expect(paths(filterBySize(entries, 400, 1024))).toEqual(["main.go", "cmd/tool.go"]);
    expect(paths(filterBySize(entries, 1025, 0))).toEqual(["vendor/lib.go"]);
    expect(paths(filterBySize(entries, 0, 60))).toEqual(["cmd", "scripts/run.sh"]);
  });

  it("matches the basename unless full path matching is enabled", () => {
    expect(paths(filterByPattern(entries, "*.go", false, false))).toEqual(["main.go", "cmd/tool.go", "vendor/lib.go"]);
    expect(paths(filterByPattern(entries, "cmd/*", true, false))).toEqual(["cmd/tool.go"]);
  });

  it("drops entries matching any exclude", () => {
    expect(paths(filterByExcludes(entries, ["vendor/**", "*.md"], true, false))).toEqual([
      "main.go",
      "cmd",
      "cmd/tool.go",
      "scripts/run.sh",
      "Makefile"
    ]);
  });

  it("returns a new array without touching its input", () => {
    const result = filterByExcludes(entries, [], false, false);
    expect(result).toEqual(entries);
    expect(result).not.toBe(entries);
  });
});

describe("filterByCommitDate", () => {
  const commits = [
    { path: "main.go", committedDate: new Date("2024-03-01T00:00:00Z") },
    { path: "cmd/tool.go", committedDate: new Date("2023-06-01T00:00:00Z") }
  ];

  it("includes commits exactly on either bound", () => {
    const result = filterByCommitDate(
      entries,
      commits,
      new Date("2023-06-01T00:00:00Z"),
      new Date("2024-03-01T00:00:00Z")
    );
    expect(paths(result)).toEqual(["main.go", "cmd/tool.go"]);
  });

  it("drops entries without a known commit date", () => {
    const result = filterByCommitDate(entries, commits, new Date("2024-01-01T00:00:00Z"), undefined);
    expect(paths(result)).toEqual(["main.go"]);
  });

  it("is the identity without bounds", () => {
    expect(filterByCommitDate(entries, [], undefined, undefined)).toEqual(entries);
  });
});

describe("applyEntryFilters", () => {
  it("keeps everything for a wildcard with default options", () => {
    expect(applyEntryFilters(entries, searchOptions())).toEqual(entries);
  });

  it("composes type, extension, size, pattern and exclude stages in tree order", () => {
    const result = applyEntryFilters(
      entries,
      searchOptions({
        pattern: "**/*",
        fullPath: true,
        fileTypes: ["file"],
        extensions: ["go"],
        minSize: 100,
        excludes: ["vendor/**"]
      })
    );
    expect(paths(result)).toEqual(["main.go", "cmd/tool.go"]);
  });
});

describe("stage composition", () => {
  type Stage = {
    readonly apply: (list: readonly TreeEntry[]) => TreeEntry[];
    readonly keeps: (item: TreeEntry) => boolean;
  };

  const basename = (item: TreeEntry): string => item.path.slice(item.path.lastIndexOf("/") + 1);

  const stages: Record<string, Stage> = {
    type: { apply: list => filterByType(list, ["file"]), keeps: item => item.type === "file" },
    extension: { apply: list => filterByExtension(list, ["go"], false), keeps: item => item.path.endsWith(".go") },
    size: { apply: list => filterBySize(list, 100, 1024), keeps: item => item.size >= 100 && item.size <= 1024 },
    pattern: { apply: list => filterByPattern(list, "*a*", false, false), keeps: item => basename(item).includes("a") }
  };

  const pairs = Object.keys(stages).flatMap((first, index, names) =>
    names.slice(index + 1).map(second => [first, second] as const)
  );

  it.each(pairs)("%s then %s keeps exactly the entries both accept", (first, second) => {
    const a = stages[first];
    const b = stages[second];
    const expected = paths(entries.filter(item => a.keeps(item) && b.keeps(item)));

    expect(paths(b.apply(a.apply(entries)))).toEqual(expected);
    expect(paths(a.apply(b.apply(entries)))).toEqual(expected);
  });
});
