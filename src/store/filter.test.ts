import { describe, it } from "node:test";
import assert from "node:assert";
import { aggregateResources, applyFields, applyFindOptions, isEmptyFilter, matchesFilter } from "./filter.js";
import { Resource } from "../types/contracts.js";

function resource(id: string, over: Partial<Resource> = {}): Resource {
  return {
    id,
    description: "Desktop computer",
    procurement_date: "2024-06-01",
    cost: 45000,
    location: "Lab 1",
    department: "CSE",
    created_by: "seed",
    created_at: "2024-06-01T00:00:00.000Z",
    updated_at: "2024-06-01T00:00:00.000Z",
    ...over
  };
}

describe("matchesFilter", () => {
  const r = resource("a", { service_tag: "ABC123" });

  it("compares identifiers and places case-insensitively", () => {
    assert.strictEqual(matchesFilter(r, { department: " cse " }), true);
    assert.strictEqual(matchesFilter(r, { service_tag: "abc123", location: "LAB 1" }), true);
    assert.strictEqual(matchesFilter(r, { location: "Lab 10" }), false);
  });

  it("matches the description as a substring", () => {
    assert.strictEqual(matchesFilter(r, { description: "COMPUTER" }), true);
    assert.strictEqual(matchesFilter(r, { description: "laptop" }), false);
  });

  it("applies cost matchers and inclusive date ranges", () => {
    assert.strictEqual(matchesFilter(r, { cost: { op: "between", min: 45000, max: 50000 } }), true);
    assert.strictEqual(matchesFilter(r, { cost: { op: "gt", value: 45000 } }), false);
    assert.strictEqual(matchesFilter(r, { procurement_date: { from: "2024-06-01", to: "2024-06-01" } }), true);
    assert.strictEqual(matchesFilter(r, { procurement_date: { to: "2024-05-31" } }), false);
  });

  it("treats an empty filter as all records", () => {
    assert.strictEqual(isEmptyFilter({}), true);
    assert.strictEqual(isEmptyFilter({ department: undefined }), true);
    assert.strictEqual(matchesFilter(r, {}), true);
  });
});

describe("applyFindOptions", () => {
  it("sorts by cost with the id as tie-breaker and limits", () => {
    const rows = [resource("b", { cost: 10 }), resource("a", { cost: 10 }), resource("c", { cost: 99 })];
    assert.deepStrictEqual(
      applyFindOptions(rows, { sort: { field: "cost", direction: "desc" } }).map((r) => r.id),
      ["c", "a", "b"]
    );
    assert.deepStrictEqual(
      applyFindOptions(rows, { sort: { field: "cost", direction: "asc" }, limit: 2 }).map((r) => r.id),
      ["a", "b"]
    );
  });
});

describe("applyFields", () => {
  it("returns null when nothing would change", () => {
    assert.strictEqual(applyFields(resource("a"), { cost: 45000, department: "CSE" }, "2026-10-19T00:00:00.000Z"), null);
  });

  it("merges changed fields and stamps updated_at", () => {
    const next = applyFields(resource("a"), { cost: 1500 }, "2026-10-19T00:00:00.000Z");
    assert.strictEqual(next?.cost, 1500);
    assert.strictEqual(next?.location, "Lab 1");
    assert.strictEqual(next?.updated_at, "2026-10-19T00:00:00.000Z");
  });
});

describe("aggregateResources", () => {
  const rows = [
    resource("a", { cost: 100, location: "Lab 1" }),
    resource("b", { cost: 300, location: "Lab 2" }),
    resource("c", { cost: 200, location: "Lab 1", department: "ECE" })
  ];

  it("reduces the whole match set", () => {
    assert.deepStrictEqual(aggregateResources(rows, { op: "sum", filter: { department: "CSE" } }), [
      { key: null, count: 2, value: 400 }
    ]);
    assert.deepStrictEqual(aggregateResources(rows, { op: "avg", filter: { department: "Physics" } }), [
      { key: null, count: 0, value: null }
    ]);
  });

  it("groups by a field, sorted by key", () => {
    assert.deepStrictEqual(aggregateResources(rows, { op: "max", filter: {}, groupBy: "location" }), [
      { key: "Lab 1", count: 2, value: 200 },
      { key: "Lab 2", count: 1, value: 300 }
    ]);
  });
});
