import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import http from "node:http";
import express from "express";
import { HttpLanguageService, safeJsonParse } from "./client.js";
import { UpstreamServiceError, UpstreamServiceTimeoutError } from "../core/errors.js";

type Seen = { auth?: string; body?: unknown };

describe("HttpLanguageService", () => {
  let server: http.Server;
  let baseUrl = "";
  const seen: Seen = {};

  before(async () => {
    const app = express();
    app.use(express.json());
    app.post("/ok/chat/completions", (req, res) => {
      seen.auth = req.header("authorization");
      seen.body = req.body;
      res.json({ choices: [{ message: { role: "assistant", content: "There are 3 laptops." } }] });
    });
    app.post("/broken/chat/completions", (_req, res) => {
      res.status(500).json({ error: "boom" });
    });
    app.post("/odd/chat/completions", (_req, res) => {
      res.json({ result: "no choices here" });
    });
    app.post("/slow/chat/completions", (_req, res) => {
      setTimeout(() => res.json({ choices: [{ message: { content: "late" } }] }), 300);
    });

    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });
    const addr = server.address();
    if (addr === null || typeof addr === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${addr.port}`;
  });

  after(() => {
    server.closeAllConnections();
    server.close();
  });

  function client(path: string, timeoutMs = 2000) {
    return new HttpLanguageService({ apiKey: "test-key", baseUrl: `${baseUrl}/${path}/`, model: "test-model", timeoutMs });
  }

  it("posts an OpenAI-style request and returns the message content", async () => {
    const out = await client("ok").infer("How many laptops?", { system: "Be brief." });
    assert.strictEqual(out, "There are 3 laptops.");
    assert.strictEqual(seen.auth, "Bearer test-key");
    assert.deepStrictEqual(seen.body, {
      model: "test-model",
      temperature: 0,
      max_tokens: 400,
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "How many laptops?" }
      ]
    });
  });

  it("maps an error status to UpstreamServiceError", async () => {
    await assert.rejects(client("broken").infer("hi"), (err: unknown) => {
      assert.ok(err instanceof UpstreamServiceError);
      assert.strictEqual(err.code, "upstream_failed");
      assert.strictEqual(err.retryable, true);
      return true;
    });
  });

  it("rejects a body without choices", async () => {
    await assert.rejects(client("odd").infer("hi"), UpstreamServiceError);
  });

  it("gives up after the timeout with a retryable error", async () => {
    await assert.rejects(client("slow", 50).infer("hi"), (err: unknown) => {
      assert.ok(err instanceof UpstreamServiceTimeoutError);
      assert.strictEqual(err.code, "upstream_timeout");
      assert.strictEqual(err.retryable, true);
      return true;
    });
  });
});

describe("safeJsonParse", () => {
  it("parses plain and fenced JSON", () => {
    assert.deepStrictEqual(safeJsonParse('{"cost": 45000}'), { cost: 45000 });
    assert.deepStrictEqual(safeJsonParse('```json\n{"service_tag": "SN-4471"}\n```'), { service_tag: "SN-4471" });
    assert.deepStrictEqual(safeJsonParse('Sure! {"department": "CSE"} Hope that helps.'), { department: "CSE" });
  });

  it("returns null when there is no JSON", () => {
    assert.strictEqual(safeJsonParse("I could not find anything."), null);
    assert.strictEqual(safeJsonParse("{not json}"), null);
  });
});
