import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { createInterpreter } from "./createInterpreter.js";
import { FileStore } from "../store/file.js";
import { UpstreamServiceTimeoutError } from "../core/errors.js";
import { LanguageService } from "../llm/types.js";
import { Caller, NewResource } from "../types/contracts.js";

const logger = pino({ level: "silent" });
const now = () => new Date(2026, 9, 19, 12, 0, 0);
const admin: Caller = { userId: "u-admin", role: "admin" };
const manager: Caller = { userId: "u-manager", role: "manager" };
const viewer: Caller = { userId: "u-viewer", role: "viewer" };

class FakeLanguage implements LanguageService {
  prompts: string[] = [];
  constructor(private reply: string | Error) {}

  async infer(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

function seed(description: string, department: string, location: string, cost: number, service_tag: string): NewResource {
  return { description, department, location, cost, service_tag, procurement_date: "2024-06-01", created_by: "seed" };
}

describe("createInterpreter", () => {
  let dir: string;
  let store: FileStore;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "interpreter_test_"));
    store = new FileStore(dir);
    await store.init();
    await store.insert(seed("Desktop computer", "CSE", "Lab 1", 45000, "PC-1"));
    await store.insert(seed("Gaming computer", "CSE", "Lab 2", 90000, "PC-2"));
    await store.insert(seed("Projector", "ECE", "Building A", 30000, "PJ-1"));
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("handleInstruction", () => {
    it("creates a resource from a complete instruction", async () => {
      const interp = createInterpreter({ store, logger, now });
      const out = await interp.handleInstruction("Create laptop with service tag ABC123 costing ₹80000 in CSE department at Lab 2", manager);

      assert.strictEqual(out.status, "ok");
      const [created] = await store.find({ service_tag: "ABC123" });
      assert.ok(created);
      assert.strictEqual(created.created_by, "u-manager");
      assert.strictEqual(created.procurement_date, "2026-10-19");
      assert.strictEqual(
        out.message,
        `Created "laptop" in the CSE department at Lab 2, costing ₹80,000 and procured on 2026-10-19, with service tag ABC123. Its resource id is ${created.id}.`
      );
      assert.deepStrictEqual(out.data, { intent: "create", resourceId: created.id });
    });

    it("asks for the identifier under the either policy and creates under optional", async () => {
      const text = "Create laptop costing ₹80000 in CSE department at Lab 2";

      const strict = await createInterpreter({ store, logger, now, schema: { identifier: "either" } }).handleInstruction(text, admin);
      assert.strictEqual(strict.status, "incomplete");
      assert.deepStrictEqual(strict.data, {
        intent: "create",
        reason: "missing_fields",
        missing: ["service_tag_or_identification_number"]
      });
      assert.strictEqual((await store.find({})).length, 3);

      const relaxed = await createInterpreter({ store, logger, now, schema: { identifier: "optional" } }).handleInstruction(text, admin);
      assert.strictEqual(relaxed.status, "ok");
      assert.strictEqual((await store.find({ description: "laptop" })).length, 1);
    });

    it("rejects a viewer's mutation and leaves the store untouched", async () => {
      const language = new FakeLanguage('{"service_tag": "X"}');
      const out = await createInterpreter({ store, logger, now, language }).handleInstruction("Delete all resources in Lab 1", viewer);

      assert.strictEqual(out.status, "error");
      assert.deepStrictEqual(out.data, { intent: "delete", code: "unauthorized", retryable: false });
      assert.strictEqual((await store.find({})).length, 3);
      assert.strictEqual(language.prompts.length, 0);
    });

    it("holds an unscoped delete until confirmed", async () => {
      const interp = createInterpreter({ store, logger, now });

      const held = await interp.handleInstruction("Delete all resources", admin);
      assert.strictEqual(held.status, "incomplete");
      assert.deepStrictEqual(held.data, { intent: "delete", reason: "confirmation_required", matched: 3 });
      assert.strictEqual((await store.find({})).length, 3);

      const done = await interp.handleInstruction("Delete all resources", admin, { confirm: true });
      assert.strictEqual(done.status, "ok");
      assert.deepStrictEqual(done.data, { intent: "delete", deleted: 3 });
      assert.strictEqual((await store.find({})).length, 0);
    });

    it("is idempotent when the same update runs twice", async () => {
      const interp = createInterpreter({ store, logger, now });
      const text = "Update cost to ₹1500 for all computers in CSE department";

      const first = await interp.handleInstruction(text, admin);
      assert.deepStrictEqual(first.data, { intent: "update", matched: 2, modified: 2 });
      const second = await interp.handleInstruction(text, admin);
      assert.deepStrictEqual(second.data, { intent: "update", matched: 2, modified: 0 });
      assert.strictEqual(
        second.message,
        'I set the cost to ₹1,500 for resources matching "computer" in the CSE department. 2 resources matched and 0 were changed; 2 already had those values.'
      );
    });

    it("answers questions in prose", async () => {
      const interp = createInterpreter({ store, logger, now });
      const count = await interp.handleInstruction("How many resources do we have in the CSE department?", viewer);
      assert.deepStrictEqual(count, {
        status: "ok",
        message: "There are 2 resources in the CSE department.",
        data: { intent: "query" }
      });

      const total = await interp.handleInstruction("What's the total value of assets in Building A?", viewer);
      assert.strictEqual(total.message, "The total value of resources at Building A is ₹30,000, across 1 resource.");
    });

    it("keeps the object noun of a question as a filter", async () => {
      await store.insert(seed("Dell laptop", "CSE", "Lab 1", 120000, "LT-1"));
      const interp = createInterpreter({ store, logger, now });

      const count = await interp.handleInstruction("How many laptops are in the CSE department?", viewer);
      assert.strictEqual(count.message, 'There is 1 resource matching "laptop" in the CSE department.');

      const top = await interp.handleInstruction("Show me the most expensive computer", viewer);
      assert.strictEqual(
        top.message,
        'The most expensive resource matching "computer" is "Gaming computer" (service tag PC-2) in the CSE department at Lab 2, costing ₹90,000.'
      );

      const rank = await interp.handleInstruction("Which department has the most computers?", viewer);
      assert.strictEqual(rank.message, 'CSE has the most resources matching "computer", with 2.');
    });

    it("deletes only the resources at the named location", async () => {
      await store.insert(seed("Old printer", "Admin", "old building", 12000, "PR-1"));
      await store.insert(seed("Old scanner", "Admin", "Old Building", 8000, "SC-1"));
      const there = (await store.find({ location: "old building" })).length;
      assert.strictEqual(there, 2);

      const out = await createInterpreter({ store, logger, now }).handleInstruction("Delete all resources in old building", admin);
      assert.strictEqual(out.status, "ok");
      assert.deepStrictEqual(out.data, { intent: "delete", deleted: there });
      assert.strictEqual(out.message, "Deleted 2 resources at old building.");
      assert.strictEqual((await store.find({ location: "old building" })).length, 0);
      assert.deepStrictEqual((await store.find({})).map((r) => r.service_tag).sort(), ["PC-1", "PC-2", "PJ-1"]);
    });

    it("merges a traceable suggestion for a create", async () => {
      const language = new FakeLanguage('{"service_tag": "SN-4471", "department": "Physics"}');
      const out = await createInterpreter({ store, logger, now, language }).handleInstruction(
        "Create Dell laptop SN-4471 costing ₹80000 in CSE department at Lab 2",
        admin
      );
      assert.strictEqual(out.status, "ok");
      const [created] = await store.find({ service_tag: "SN-4471" });
      assert.strictEqual(created?.department, "CSE");
      assert.strictEqual(language.prompts.length, 1);
    });

    it("does not consult the language service for a complete draft", async () => {
      const language = new FakeLanguage("{}");
      await createInterpreter({ store, logger, now, language }).handleInstruction(
        "Create laptop with service tag ABC123 costing ₹80000 in CSE department at Lab 2",
        admin
      );
      assert.strictEqual(language.prompts.length, 0);
    });

    it("fails with a retryable error when the language service times out", async () => {
      const language = new FakeLanguage(new UpstreamServiceTimeoutError(50));
      const out = await createInterpreter({ store, logger, now, language }).handleInstruction(
        "Create laptop costing ₹80000 in CSE department at Lab 2",
        admin
      );
      assert.strictEqual(out.status, "error");
      assert.deepStrictEqual(out.data, { intent: "create", code: "upstream_timeout", retryable: true });
      assert.strictEqual((await store.find({})).length, 3);
    });

    it("reports a duplicate service tag without writing", async () => {
      const out = await createInterpreter({ store, logger, now }).handleInstruction(
        "Create laptop with service tag PC-1 costing ₹80000 in CSE department at Lab 2",
        admin
      );
      assert.strictEqual(out.status, "error");
      assert.strictEqual(out.data?.code, "duplicate_service_tag");
      assert.strictEqual((await store.find({})).length, 3);
    });

    it("reports invalid values as incomplete", async () => {
      const out = await createInterpreter({ store, logger, now }).handleInstruction(
        "Create laptop with service tag LT-5 costing ₹80000 in CSE department at Lab 2 purchased on 2030-01-01",
        admin
      );
      assert.strictEqual(out.status, "incomplete");
      assert.deepStrictEqual(out.data, { intent: "create", reason: "invalid" });
      assert.strictEqual(out.message, "I can't apply this because the procurement date cannot be in the future. Nothing was changed.");
    });

    it("refuses a purchase date it cannot read instead of using today", async () => {
      const out = await createInterpreter({ store, logger, now }).handleInstruction(
        "Create laptop with service tag LT-5 costing ₹80000 in CSE department at Lab 2 purchased on 31/02/2024",
        admin
      );
      assert.strictEqual(out.status, "incomplete");
      assert.deepStrictEqual(out.data, { intent: "create", reason: "invalid" });
      assert.strictEqual(
        out.message,
        'I can\'t apply this because the procurement date "31/02/2024" is not a date I can read. Nothing was changed.'
      );
      assert.strictEqual((await store.find({})).length, 3);
    });
  });

  describe("answerChat", () => {
    it("replaces a JSON reply with prose from the inventory", async () => {
      const language = new FakeLanguage('{"answer": "hello"}');
      const out = await createInterpreter({ store, logger, now, language }).answerChat("hello there", viewer, []);
      assert.strictEqual(out.status, "ok");
      assert.ok(out.message.startsWith("I can answer questions about the inventory"));
      assert.ok(out.message.endsWith("The inventory currently holds 3 resources worth ₹1,65,000."));
      assert.ok(language.prompts[0].startsWith("Inventory facts: There are 3 resources in the inventory, worth ₹1,65,000 in total"));
    });

    it("passes a prose reply through", async () => {
      const language = new FakeLanguage("Hi! Ask me about equipment in any department.");
      const out = await createInterpreter({ store, logger, now, language }).answerChat("hello there", viewer);
      assert.strictEqual(out.message, "Hi! Ask me about equipment in any department.");
    });

    it("answers recognised questions without the language service", async () => {
      const language = new FakeLanguage("unused");
      const out = await createInterpreter({ store, logger, now, language }).answerChat("Which location has the most resources?", viewer);
      assert.strictEqual(out.message, "Building A has the most resources across the whole inventory, with 1. Next is Lab 1 with 1.");
      assert.strictEqual(language.prompts.length, 0);
    });
  });
});
