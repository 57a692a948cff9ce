import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { SqliteStore } from "./sqlite.js";
import { DuplicateServiceTagError } from "../core/errors.js";
import { NewResource } from "../types/contracts.js";

function input(description: string, over: Partial<NewResource> = {}): NewResource {
  return {
    description,
    procurement_date: "2024-06-01",
    cost: 1000,
    location: "Lab 1",
    department: "CSE",
    created_by: "u1",
    ...over
  };
}

describe("SqliteStore", () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = new SqliteStore(":memory:");
    await store.init();
  });

  afterEach(async () => {
    await store.close();
  });

  it("round-trips optional identifiers as absent fields", async () => {
    const r = await store.insert(input("Laptop"));
    const [found] = await store.find({});
    assert.deepStrictEqual(found, r);
    assert.strictEqual("service_tag" in found, false);
  });

  it("filters by equality, substring, cost and date", async () => {
    await store.insert(input("Desktop computer", { service_tag: "PC-1", cost: 45000 }));
    await store.insert(input("Gaming computer", { service_tag: "PC-2", cost: 90000, department: "ECE" }));
    await store.insert(input("Projector", { service_tag: "PJ-1", cost: 30000, procurement_date: "2019-03-01" }));

    const tags = async (f: Parameters<SqliteStore["find"]>[0]) => (await store.find(f)).map((r) => r.service_tag).sort();
    assert.deepStrictEqual(await tags({ department: " cse" }), ["PC-1", "PJ-1"]);
    assert.deepStrictEqual(await tags({ description: "COMPUTER" }), ["PC-1", "PC-2"]);
    assert.deepStrictEqual(await tags({ cost: { op: "between", min: 30000, max: 45000 } }), ["PC-1", "PJ-1"]);
    assert.deepStrictEqual(await tags({ cost: { op: "gt", value: 45000 } }), ["PC-2"]);
    assert.deepStrictEqual(await tags({ procurement_date: { to: "2019-12-31" } }), ["PJ-1"]);
    assert.deepStrictEqual(await tags({ service_tag: "pc-2" }), ["PC-2"]);
  });

  it("sorts and limits", async () => {
    await store.insert(input("A", { cost: 10 }));
    await store.insert(input("B", { cost: 30 }));
    await store.insert(input("C", { cost: 20 }));
    const rows = await store.find({}, { sort: { field: "cost", direction: "desc" }, limit: 2 });
    assert.deepStrictEqual(rows.map((r) => r.description), ["B", "C"]);
  });

  it("rejects a duplicate service tag regardless of case", async () => {
    await store.insert(input("Laptop", { service_tag: "LT-1" }));
    await assert.rejects(store.insert(input("Other", { service_tag: "lt-1" })), DuplicateServiceTagError);
    assert.strictEqual((await store.find({})).length, 1);
  });

  it("updates in one transaction and counts matched and modified", async () => {
    await store.insert(input("Laptop A", { cost: 1500 }));
    await store.insert(input("Laptop B"));
    assert.deepStrictEqual(await store.updateMany({ description: "laptop" }, { cost: 1500 }), { matched: 2, modified: 1 });
    assert.deepStrictEqual(await store.updateMany({ description: "laptop" }, { cost: 1500 }), { matched: 2, modified: 0 });

    await assert.rejects(store.updateMany({ description: "laptop" }, { service_tag: "LT-9", cost: 1 }), DuplicateServiceTagError);
    const costs = (await store.find({ description: "laptop" })).map((r) => r.cost);
    assert.deepStrictEqual(costs, [1500, 1500]);
  });

  it("deletes and reports the count", async () => {
    await store.insert(input("Old printer", { location: "old building" }));
    await store.insert(input("Old scanner", { location: "Old Building" }));
    await store.insert(input("New printer", { location: "Lab 1" }));
    assert.strictEqual(await store.deleteMany({ location: "old building" }), 2);
    assert.strictEqual(await store.deleteMany({ location: "old building" }), 0);
    assert.strictEqual((await store.find({})).length, 1);
  });

  it("aggregates with and without groups", async () => {
    assert.deepStrictEqual(await store.aggregate({ op: "avg", filter: {} }), [{ key: null, count: 0, value: null }]);
    assert.deepStrictEqual(await store.aggregate({ op: "sum", filter: {} }), [{ key: null, count: 0, value: 0 }]);

    await store.insert(input("Laptop", { cost: 500, location: "Lab 2" }));
    await store.insert(input("Mouse", { cost: 20, location: "Lab 2" }));
    await store.insert(input("Chair", { cost: 80, location: "Lab 1" }));
    assert.deepStrictEqual(await store.aggregate({ op: "sum", filter: {}, groupBy: "location" }), [
      { key: "Lab 1", count: 1, value: 80 },
      { key: "Lab 2", count: 2, value: 520 }
    ]);
    assert.deepStrictEqual(await store.aggregate({ op: "count", filter: { location: "lab 2" } }), [
      { key: null, count: 2, value: 2 }
    ]);
  });

  it("folds non-ASCII case the same way as the file store", async () => {
    await store.insert(input("Écran tactile", { department: "Électronique", location: "Salle Ä", service_tag: "ÉT-1" }));
    assert.strictEqual((await store.find({ department: "électronique" })).length, 1);
    assert.strictEqual((await store.find({ location: "salle ä" })).length, 1);
    assert.strictEqual((await store.find({ description: "ÉCRAN" })).length, 1);
    await assert.rejects(store.insert(input("Other", { service_tag: "ét-1" })), DuplicateServiceTagError);

    await store.updateMany({ service_tag: "ét-1" }, { department: "Órgano" });
    assert.strictEqual((await store.find({ department: "ÓRGANO" })).length, 1);
  });

  it("never lets a read see an update half-applied", async () => {
    for (let i = 0; i < 200; i++) await store.insert(input(`Chair ${i}`, { cost: 100 }));

    const updated = (rows: { cost: number }[]) => rows.filter((r) => r.cost === 500).length;
    const before = store.find({ department: "CSE" });
    const update = store.updateMany({ department: "CSE" }, { cost: 500 });
    const during = Array.from({ length: 20 }, () => store.find({ department: "CSE" }));
    const counts = await store.aggregate({ op: "count", filter: { cost: { op: "eq", value: 500 } } });

    assert.strictEqual(updated(await before), 0);
    assert.deepStrictEqual(await update, { matched: 200, modified: 200 });
    for (const rows of await Promise.all(during)) assert.strictEqual(updated(rows), 200);
    assert.strictEqual(counts[0]?.count, 200);
  });
});
