import { describe, expect, it } from "vitest";
import { MemoryReporter, createReporter } from "../src/log/reporter.js";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    streams: { out: { write: (s: string) => out.push(s) }, err: { write: (s: string) => err.push(s) } },
  };
}

describe("createReporter", () => {
  it("writes one JSON diagnostic per line in jsonl format", () => {
    const c = capture();
    const r = createReporter("jsonl", c.streams);
    r.section("Building payload");
    r.info("BUILT", "payload: payload:v0.11.0", { digest: "sha256:aaa" });
    r.error("BUILD_ERROR", "harbor-core: compile failed");

    expect(c.out).toEqual([
      '{"level":"info","code":"BUILT","message":"payload: payload:v0.11.0","details":{"digest":"sha256:aaa"}}\n',
      '{"level":"error","code":"BUILD_ERROR","message":"harbor-core: compile failed"}\n',
    ]);
    expect(c.err).toEqual([]);
  });

  it("writes tagged lines in human format, errors to stderr", () => {
    const c = capture();
    const r = createReporter("human", c.streams, false);
    r.info("FETCH", "payload: fetching");
    r.warn("NODE_LABEL_FAILED", "Could not label nodes");
    r.error("APPLY_ERROR", "Failed to apply ccruntime.yaml", { detail: "error: no matches for kind" });

    expect(c.out).toEqual(["[INFO] payload: fetching\n", "[WARN] Could not label nodes\n"]);
    expect(c.err).toEqual(["[ERROR] Failed to apply ccruntime.yaml\n", "error: no matches for kind\n"]);
  });

  it("prints section banners in human format only", () => {
    const c = capture();
    createReporter("human", c.streams, false).section("Validating CoCo Installation");
    const rule = "=".repeat(60);
    expect(c.out).toEqual([`\n${rule}\n  Validating CoCo Installation\n${rule}\n\n`]);
  });

  it("colours tags when asked", () => {
    const c = capture();
    createReporter("human", c.streams, true).info("OK", "done");
    expect(c.out).toEqual(["\u001b[92m[INFO]\u001b[0m done\n"]);
  });
});

describe("MemoryReporter", () => {
  it("keeps diagnostics and filters codes by level", () => {
    const r = new MemoryReporter();
    r.info("A", "a");
    r.warn("B", "b");
    r.error("C", "c");
    r.section("S");
    expect(r.codes()).toEqual(["A", "B", "C"]);
    expect(r.codes("warn")).toEqual(["B"]);
    expect(r.sections).toEqual(["S"]);
  });
});
