import { describe, expect, it } from "vitest";
import path from "node:path";
import { LocalImageRegistrar } from "../src/image/registrar.js";
import { ContainerTool } from "../src/image/container-tool.js";
import { RegistrationError } from "../src/errors.js";
import type { BuildResult } from "../src/types/build.js";
import { FakeCluster, tmpDir } from "./fakes.js";

function result(ref: string, digest: string): BuildResult {
  const [componentName, version] = ref.split(":");
  return { componentName, version, imageReference: ref, digest, buildDurationMs: 1, logExcerpt: "" };
}

function registrar(cluster: FakeCluster, buildNamespace = "default", attempts = 1) {
  return new LocalImageRegistrar({
    tool: new ContainerTool("nerdctl", cluster.run),
    buildNamespace,
    runtimeNamespace: "k8s.io",
    stagingDir: path.join(tmpDir(), "images"),
    retry: { attempts, backoff_ms: 0 },
    wait: async () => undefined,
  });
}

describe("LocalImageRegistrar", () => {
  it("moves an image from the build namespace into the runtime namespace", async () => {
    const cluster = new FakeCluster();
    cluster.seedImage("default", "payload:v0.11.0", "sha256:aaa");

    const outcome = await registrar(cluster).register(result("payload:v0.11.0", "sha256:aaa"));
    expect(outcome).toEqual({ imageReference: "payload:v0.11.0", namespace: "k8s.io", changed: true });
    expect(cluster.imageIn("k8s.io", "payload:v0.11.0")).toBe("sha256:aaa");
    expect(cluster.toolCalls("save")).toHaveLength(1);
    expect(cluster.toolCalls("load")).toHaveLength(1);
  });

  it("is idempotent for the same reference and digest", async () => {
    const cluster = new FakeCluster();
    cluster.seedImage("default", "payload:v0.11.0", "sha256:aaa");
    const reg = registrar(cluster);

    await reg.register(result("payload:v0.11.0", "sha256:aaa"));
    const callsBefore = cluster.calls.length;
    const again = await reg.register(result("payload:v0.11.0", "sha256:aaa"));

    expect(again.changed).toBe(false);
    expect(cluster.calls.length).toBe(callsBefore);
  });

  it("skips the transfer when the runtime namespace already has the digest", async () => {
    const cluster = new FakeCluster();
    cluster.seedImage("default", "payload:v0.11.0", "sha256:aaa");
    cluster.seedImage("k8s.io", "payload:v0.11.0", "sha256:aaa");

    const outcome = await registrar(cluster).register(result("payload:v0.11.0", "sha256:aaa"));
    expect(outcome.changed).toBe(false);
    expect(cluster.toolCalls("save")).toHaveLength(0);
  });

  it("replaces a stale image with the new digest", async () => {
    const cluster = new FakeCluster();
    cluster.seedImage("default", "payload:v0.11.0", "sha256:new");
    cluster.seedImage("k8s.io", "payload:v0.11.0", "sha256:old");

    const outcome = await registrar(cluster).register(result("payload:v0.11.0", "sha256:new"));
    expect(outcome.changed).toBe(true);
    expect(cluster.imageIn("k8s.io", "payload:v0.11.0")).toBe("sha256:new");
  });

  it("only verifies presence when building straight into the runtime namespace", async () => {
    const cluster = new FakeCluster();
    cluster.seedImage("k8s.io", "payload:v0.11.0", "sha256:aaa");

    const outcome = await registrar(cluster, "k8s.io").register(result("payload:v0.11.0", "sha256:aaa"));
    expect(outcome.changed).toBe(false);
    expect(cluster.toolCalls("save")).toHaveLength(0);
  });

  it("fails when the image is absent from a shared namespace", async () => {
    const cluster = new FakeCluster();
    await expect(registrar(cluster, "k8s.io").register(result("payload:v0.11.0", "sha256:aaa"))).rejects.toThrow(
      "payload:v0.11.0 is not present in namespace k8s.io",
    );
  });

  it("raises a retryable RegistrationError when the runtime store is unreachable", async () => {
    const cluster = new FakeCluster();
    cluster.seedImage("default", "payload:v0.11.0", "sha256:aaa");
    cluster.unreachableNamespaces.add("k8s.io");

    const err = await registrar(cluster, "default", 2).register(result("payload:v0.11.0", "sha256:aaa")).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RegistrationError);
    if (err instanceof RegistrationError) {
      expect(err.message).toBe("image namespace k8s.io is unreachable");
      expect(err.retryable).toBe(true);
      expect(err.detail).toContain("connection refused");
    }
    // two attempts, one inspect each
    expect(cluster.toolCalls("image")).toHaveLength(2);
  });

  it("reports presence in the runtime namespace", async () => {
    const cluster = new FakeCluster();
    cluster.seedImage("k8s.io", "payload:v0.11.0", "sha256:aaa");
    const reg = registrar(cluster);
    expect(await reg.imageExists("payload:v0.11.0")).toBe(true);
    expect(await reg.imageExists("harbor-core:v2.10.0")).toBe(false);
  });
});
