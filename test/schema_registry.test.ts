import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseDecision, parseDispatch, parseHandshake, parseExecutionState, queryParam } from "../src/api/requests.js";
import { ValidationError } from "../src/core/errors.js";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import { fp } from "./fakes.js";

const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["config", "decision", "dispatch", "handshake"]);
  });

  it("reads versions from $id", () => {
    expect(registry.versions()).toEqual({ config: "1.0.0", decision: "1.0.0", dispatch: "1.0.0", handshake: "1.0.0" });
  });

  it("reports missing schemas and compiles the present ones", async () => {
    expect(registry.missing(["handshake", "freeze", "dispatch"])).toEqual(["freeze"]);
    expect(await registry.compileAll(["handshake", "decision", "dispatch", "freeze"])).toEqual({});
  });

  it("refuses unknown schemas", async () => {
    await expect(registry.validate("freeze", {})).rejects.toThrow("Schema not found: freeze");
  });

  describe("handshake schema", () => {
    it("accepts an id and a colon-separated fingerprint", async () => {
      expect((await registry.validate("handshake", { id: "web-01.dc1", fingerprint: fp("web-01") })).valid).toBe(true);
    });

    it("rejects extra fields and malformed values", async () => {
      expect((await registry.validate("handshake", { id: "web1", fingerprint: fp("web1"), role: "admin" })).valid).toBe(false);
      expect((await registry.validate("handshake", { id: "-web1", fingerprint: fp("web1") })).valid).toBe(false);
      expect((await registry.validate("handshake", { id: "web1", fingerprint: "aa:bb" })).valid).toBe(false);
    });
  });

  describe("dispatch schema", () => {
    it("accepts a payload with optional args and timeout", async () => {
      const body = { targetId: "web1", payload: { fun: "cmd.run", args: ["uptime"] }, timeout: 30 };
      expect((await registry.validate("dispatch", body)).valid).toBe(true);
      expect((await registry.validate("dispatch", { targetId: "web1", payload: { fun: "test.ping" } })).valid).toBe(true);
    });

    it("rejects non-integer timeouts and non-string args", async () => {
      const check = await registry.validate("dispatch", { targetId: "web1", payload: { fun: "cmd.run", args: [1] }, timeout: 0 });
      expect(check.valid).toBe(false);
      expect(check.errors).toContain("data/payload/args/0 must be string");
      expect(check.errors).toContain("data/timeout must be >= 1");
    });
  });

  describe("decision schema", () => {
    it("accepts accept and reject decisions", async () => {
      expect((await registry.validate("decision", { id: "web1", decision: "accept", fingerprint: fp("web1") })).valid).toBe(true);
      expect((await registry.validate("decision", { id: "web1", decision: "reject" })).valid).toBe(true);
      expect((await registry.validate("decision", { id: "web1", decision: "maybe" })).valid).toBe(false);
    });
  });
});

describe("request parsing", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("parses handshakes", async () => {
    expect(await parseHandshake(registry, { id: "web1", fingerprint: fp("web1") })).toEqual({ id: "web1", fingerprint: fp("web1") });
    await expect(parseHandshake(registry, null)).rejects.toBeInstanceOf(ValidationError);
  });

  it("parses decisions", async () => {
    expect(await parseDecision(registry, { id: "web1", decision: "reject" })).toEqual({ id: "web1", decision: "reject" });
    expect(await parseDecision(registry, { id: "web1", decision: "accept", fingerprint: fp("web1") })).toEqual({
      id: "web1",
      decision: "accept",
      fingerprint: fp("web1"),
    });
    await expect(parseDecision(registry, { id: "web1", decision: "accept" })).rejects.toThrow(
      "Invalid decision request: accept requires a fingerprint",
    );
  });

  it("parses dispatches with default args", async () => {
    expect(await parseDispatch(registry, { targetId: "web1", payload: { fun: "test.ping" } })).toEqual({
      targetId: "web1",
      payload: { fun: "test.ping", args: [] },
      timeout: undefined,
    });
  });

  it("checks query parameters", () => {
    expect(queryParam(undefined, "state")).toBeUndefined();
    expect(queryParam("running", "state")).toBe("running");
    expect(() => queryParam(["a", "b"], "state")).toThrow("Query parameter state must be given once");
    expect(parseExecutionState("timed_out")).toBe("timed_out");
    expect(() => parseExecutionState("done")).toThrow("Unknown execution state: done");
  });
});
