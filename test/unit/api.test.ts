import test from "node:test";
import assert from "node:assert/strict";
import request from "supertest";

process.env.LLM_PROFILE = "stub";

const { app } = await import("../../src/app");

test("GET /api/health reports the catalog size", async () => {
  const res = await request(app).get("/api/health");
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { ok: true, cities: 30 });
});

test("GET /api/meta/catalog lists catalog facets", async () => {
  const res = await request(app).get("/api/meta/catalog");
  assert.equal(res.status, 200);
  assert.equal(res.body.count, 30);
  assert.ok(res.body.tags.includes("ski"));
  assert.ok(res.body.countries.includes("Japan"));
});

test("GET /api/meta/scoring exposes the weight table", async () => {
  const res = await request(app).get("/api/meta/scoring");
  assert.equal(res.status, 200);
  assert.deepEqual(res.body.weights, { temp: 0.4, rain: 0.3, crowd: 0.2, tags: 0.1 });
});

test("POST /api/destinations/search returns ranked results and the report", async () => {
  const res = await request(app)
    .post("/api/destinations/search")
    .send({ travel_month: 7, crowd_preference: "any", num_results: 3 });

  assert.equal(res.status, 200);
  assert.equal(res.body.month, "July");
  assert.equal(res.body.results.length, 3);
  assert.deepEqual(
    res.body.results.map((entry: { rank: number }) => entry.rank),
    [1, 2, 3]
  );
  const finals = res.body.results.map((entry: { scores: { final: number } }) => entry.scores.final);
  assert.ok(finals[0] >= finals[1] && finals[1] >= finals[2]);
  assert.ok(String(res.body.report).startsWith("[DATASET: TOP DESTINATIONS FOR JULY]"));
});

test("POST /api/destinations/search returns the empty report when every region is excluded", async () => {
  const res = await request(app)
    .post("/api/destinations/search")
    .send({ travel_month: 7, crowd_preference: "any", exclude_regions: ["a", "e"] });

  assert.equal(res.status, 200);
  assert.deepEqual(res.body.results, []);
  assert.equal(res.body.report, "[No destinations matched the criteria for July. Suggest broadening preferences.]");
});

test("POST /api/destinations/search rejects an invalid month", async () => {
  const res = await request(app).post("/api/destinations/search").send({ travel_month: 13, crowd_preference: "any" });
  assert.equal(res.status, 400);
  assert.equal(res.body.error, "Invalid destination search.");
  assert.equal(res.body.issues[0].path, "travel_month");
});

test("POST /api/chat requires a message", async () => {
  const res = await request(app).post("/api/chat").send({ message: "   " });
  assert.equal(res.status, 400);
  assert.equal(res.body.error, "Message is required.");
});

test("POST /api/chat runs an agent turn and keeps the session", async () => {
  const first = await request(app).post("/api/chat").send({ message: "Warm beach places in March, not Europe" });
  assert.equal(first.status, 200);
  assert.equal(typeof first.body.sessionId, "string");
  assert.ok(String(first.body.reply).startsWith("Here is what the climate data shows:\n**"));
  assert.deepEqual(
    first.body.messages.map((message: { role: string }) => message.role),
    ["user", "assistant", "tool", "assistant"]
  );

  const second = await request(app)
    .post("/api/chat")
    .send({ sessionId: first.body.sessionId, message: "thanks" });
  assert.equal(second.status, 200);
  assert.equal(second.body.sessionId, first.body.sessionId);
  assert.deepEqual(
    second.body.messages.map((message: { role: string }) => message.role),
    ["user", "assistant"]
  );
});

test("POST /api/session/new starts an empty session", async () => {
  const res = await request(app).post("/api/session/new").send({});
  assert.equal(res.status, 200);
  assert.equal(typeof res.body.sessionId, "string");
  assert.deepEqual(res.body.messages, []);
});
