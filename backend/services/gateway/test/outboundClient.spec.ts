// backend/services/gateway/test/outboundClient.spec.ts
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { OutboundClient } from "../src/clients/OutboundClient";
import { DEAD_URL, delayed, listen, silentLog, stubApp, type Listening } from "./helpers/backends";

let upstream: Listening;
const seenRequestIds: Array<string | undefined> = [];

beforeAll(async () => {
  const app = stubApp();
  app.get("/json", (req, res) => {
    seenRequestIds.push(req.header("x-request-id"));
    res.json([1, 2, 3]);
  });
  app.get("/text", (_req, res) => {
    res.type("text/plain").send("hello");
  });
  app.get("/empty", (_req, res) => {
    res.status(200).end();
  });
  app.get("/fail", (_req, res) => {
    res.status(500).json({ detail: "boom" });
  });
  app.get("/slow", delayed(1000, { late: true }));
  app.get("/trickle", (_req, res) => {
    res.status(200).type("application/json");
    res.write("[");
    const tick = setInterval(() => res.write(" "), 50);
    res.once("close", () => clearInterval(tick));
  });

  app.post("/created", (req, res) => {
    res.status(201).json({ id: 9, ...req.body });
  });
  app.post("/ack", (_req, res) => {
    res.status(204).end();
  });
  app.post("/plain", (_req, res) => {
    res.type("text/plain").send("done");
  });
  app.post("/reject", (_req, res) => {
    res.status(400).type("text/plain").send("bad input");
  });

  upstream = await listen(app);
});

afterAll(async () => {
  await upstream.close();
});

const client = () => new OutboundClient({ timeoutMs: 300, log: silentLog });

describe("OutboundClient.get", () => {
  it("returns the parsed body on 2xx JSON", async () => {
    await expect(client().get(`${upstream.url}/json`)).resolves.toEqual([1, 2, 3]);
  });

  it("propagates the request id", async () => {
    await client().get(`${upstream.url}/json`, { requestId: "rid-outbound" });
    expect(seenRequestIds).toContain("rid-outbound");
  });

  it("classifies a non-2xx answer as status", async () => {
    const out = await client().tryGet(`${upstream.url}/fail`);
    expect(out).toEqual({ ok: false, cause: "status", detail: "HTTP 500" });
    await expect(client().get(`${upstream.url}/fail`)).resolves.toBeUndefined();
  });

  it("classifies non-JSON and empty bodies as malformed", async () => {
    expect(await client().tryGet(`${upstream.url}/text`)).toMatchObject({ cause: "malformed" });
    expect(await client().tryGet(`${upstream.url}/empty`)).toMatchObject({ cause: "malformed" });
  });

  it("classifies a refused connection as network", async () => {
    expect(await client().tryGet(`${DEAD_URL}/json`)).toMatchObject({ ok: false, cause: "network" });
  });

  it("gives up after its timeout", async () => {
    const started = Date.now();
    const out = await client().tryGet(`${upstream.url}/slow`);
    expect(out).toMatchObject({ ok: false, cause: "timeout" });
    expect(Date.now() - started).toBeLessThan(900);
  });

  it("enforces the timeout on the whole exchange, not just socket idle", async () => {
    const started = Date.now();
    const out = await client().tryGet(`${upstream.url}/trickle`);
    expect(out).toEqual({ ok: false, cause: "timeout", detail: "timeout of 300ms exceeded" });
    expect(Date.now() - started).toBeLessThan(900);
  });

  it("classifies an aborted call as aborted", async () => {
    const ctl = new AbortController();
    ctl.abort();
    const out = await client().tryGet(`${upstream.url}/json`, { signal: ctl.signal });
    expect(out).toMatchObject({ ok: false, cause: "aborted" });
  });
});

describe("OutboundClient.post", () => {
  it("relays the 2xx status and parsed body", async () => {
    const out = await client().post(`${upstream.url}/created`, { name: "x" });
    expect(out).toEqual({ ok: true, status: 201, data: { id: 9, name: "x" } });
  });

  it("acknowledges an empty 2xx body with { status: 'ok' }", async () => {
    const out = await client().post(`${upstream.url}/ack`, {});
    expect(out).toEqual({ ok: true, status: 204, data: { status: "ok" } });
  });

  it("acknowledges a non-JSON 2xx body with { status: 'ok' }", async () => {
    const out = await client().post(`${upstream.url}/plain`, {});
    expect(out).toEqual({ ok: true, status: 200, data: { status: "ok" } });
  });

  it("carries a rejection's status and body text verbatim", async () => {
    const out = await client().post(`${upstream.url}/reject`, {});
    expect(out).toEqual({
      ok: false,
      error: { kind: "upstream", status: 400, detail: "bad input" },
    });
  });

  it("turns a transport failure into a 502 naming the url", async () => {
    const out = await client().post(`${DEAD_URL}/users`, {});
    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.error.kind).toBe("transport");
    expect(out.error.status).toBe(502);
    expect(out.error.detail.startsWith(`Error calling ${DEAD_URL}/users: `)).toBe(true);
  });
});
