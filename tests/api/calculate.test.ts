import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/server.js";
import { createMemoryHistoryStore } from "../../src/storage/memory/history.js";
import type { HistoryStore } from "../../src/history/types.js";
import { resetMetrics } from "../../src/metrics.js";

const NOW = new Date("2025-01-01T12:00:00.000Z");

function buildApp(history: HistoryStore = createMemoryHistoryStore(20)) {
  return createApp({ config: { currency: "$", apiKeys: [] }, history, now: () => NOW });
}

describe("POST /api/calculate", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("returns the split and saves it", async () => {
    const history = createMemoryHistoryStore(20);
    const response = await request(buildApp(history))
      .post("/api/calculate")
      .send({ bill: "50.00", tipPercent: 15, partySize: 2 })
      .expect(200);

    expect(response.body.result.total).toBe(57.5);
    expect(response.body.result.perPerson).toBe(28.75);
    expect(response.body.text).toBe("Bill: $50.00\nTip (15.0%): $7.50\nTotal: $57.50\nEach (x2): $28.75");
    expect(response.body.saved).toBe(true);
    expect(response.body.record).toEqual({
      timestamp: 1735732800,
      bill: 50,
      tipPercent: 15,
      partySize: 2,
      perPerson: 28.75,
      total: 57.5
    });
    expect(await history.loadAll()).toHaveLength(1);
  });

  it("rounds up and applies defaults", async () => {
    const response = await request(buildApp())
      .post("/api/calculate")
      .send({ bill: 50, partySize: 3, roundUp: true, currency: "€" })
      .expect(200);

    expect(response.body.result.tipPercent).toBe(15);
    expect(response.body.result.perPerson).toBe(19.17);
    expect(response.body.text).toBe("Bill: €50.00\nTip (15.0%): €7.50\nTotal: €57.50\nEach (x3): €19.17");
  });

  it("answers 422 with the validation code", async () => {
    const history = createMemoryHistoryStore(20);
    const response = await request(buildApp(history))
      .post("/api/calculate")
      .send({ bill: "abc" })
      .expect(422);

    expect(response.body).toEqual({ error: "InvalidBill", message: "Please enter a valid bill amount." });
    expect(await history.loadAll()).toEqual([]);
  });

  it("rejects tips outside the slider range", async () => {
    const response = await request(buildApp())
      .post("/api/calculate")
      .send({ bill: "10", tipPercent: 60 })
      .expect(400);

    expect(response.body.error).toBe("invalid_request");
    expect(response.body.issues[0].path).toBe("tipPercent");
  });

  it("rejects malformed JSON", async () => {
    const response = await request(buildApp())
      .post("/api/calculate")
      .set("Content-Type", "application/json")
      .send("{\"bill\":")
      .expect(400);

    expect(response.body).toEqual({ error: "invalid_json" });
  });

  it("reports an unsaved result without failing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const failing: HistoryStore = {
      loadAll: async () => [],
      append: async () => ({ ok: false, error: new Error("read-only file system") }),
      select: async () => null,
      clear: async () => ({ ok: true })
    };

    const response = await request(buildApp(failing))
      .post("/api/calculate")
      .send({ bill: "20", partySize: 2 })
      .expect(200);

    expect(response.body.saved).toBe(false);
    expect(response.body.result.perPerson).toBe(11.5);
  });
});

describe("service endpoints", () => {
  it("answers health checks", async () => {
    const response = await request(buildApp()).get("/health").expect(200);

    expect(response.text).toBe("ok");
  });

  it("exposes counters and the history gauge", async () => {
    resetMetrics();
    const app = buildApp();
    await request(app).post("/api/calculate").send({ bill: "10" }).expect(200);
    await request(app).post("/api/calculate").send({ bill: "-1" }).expect(422);

    const response = await request(app).get("/metrics").expect(200);

    expect(response.headers["content-type"]).toContain("text/plain");
    const lines = response.text.split("\n");
    expect(lines).toContain("calculations_total 1");
    expect(lines).toContain("validation_failures_total 1");
    expect(lines).toContain("history_write_failures_total 0");
    expect(lines).toContain("history_entries 1");
  });

  it("answers 404 for unknown routes", async () => {
    const response = await request(buildApp()).get("/nope").expect(404);

    expect(response.body).toEqual({ error: "not_found" });
  });
});
