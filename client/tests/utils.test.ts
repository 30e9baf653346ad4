import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { parseInvocation } from "../utils/cli.js";
import { fieldCoverage } from "../utils/coverage.js";
import { emitNDJSON, ndjsonPath, readNDJSON } from "../utils/emitter.js";

describe("parseInvocation", () => {
  it("is empty without a resource", () => {
    expect(parseInvocation([])).toBeUndefined();
  });

  it("reads an object id and typed parameters", () => {
    expect(parseInvocation(["children", "11", "as_of=2024-01-01"])).toEqual({
      resource: "children",
      id: 11,
      params: { as_of: "2024-01-01" },
    });
    expect(parseInvocation(["classrooms", "show_inactive=true"])).toEqual({
      resource: "classrooms",
      params: { show_inactive: true },
    });
  });

  it("collects repeated keys", () => {
    expect(parseInvocation(["users", "roles=teacher", "roles=parent", "classroom_id=3"])).toEqual({
      resource: "users",
      params: { roles: ["teacher", "parent"], classroom_id: 3 },
    });
  });

  it("only takes the id right after the resource", () => {
    expect(() => parseInvocation(["children", "classroom_id=3", "7"])).toThrow('expected key=value, got "7"');
    expect(() => parseInvocation(["children", "=3"])).toThrow('expected key=value, got "=3"');
  });
});

describe("fieldCoverage", () => {
  it("counts non-null, non-empty values per field", () => {
    const report = fieldCoverage([
      { id: 1, email: "a@example.org", roles: [] },
      { id: 2, email: null, roles: ["parent"] },
      "not a record",
    ]);
    expect(report).toEqual({
      records: 2,
      fields: [
        { field: "id", present: 2, pct: 100 },
        { field: "email", present: 1, pct: 50 },
        { field: "roles", present: 1, pct: 50 },
      ],
    });
  });

  it("handles an empty file", () => {
    expect(fieldCoverage([])).toEqual({ records: 0, fields: [] });
  });

  it("rounds to one decimal", () => {
    const report = fieldCoverage([{ grade: "K" }, { grade: null }, { grade: null }]);
    expect(report.fields).toEqual([{ field: "grade", present: 1, pct: 33.3 }]);
  });
});

describe("NDJSON files", () => {
  let dir = "";

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it("write one record per line and read them back", () => {
    dir = mkdtempSync(join(tmpdir(), "ndjson-"));
    const path = emitNDJSON(dir, "levels/by_date", [{ id: 1 }, { id: 2, date: "2024-03-01" }]);
    expect(path).toBe(join(dir, "levels_by_date.ndjson"));
    expect(readNDJSON(path)).toEqual([{ id: 1 }, { id: 2, date: "2024-03-01" }]);
  });

  it("read a missing file as empty", () => {
    expect(readNDJSON(ndjsonPath(join(tmpdir(), "no-such-dir-for-ndjson"), "children"))).toEqual([]);
  });
});
