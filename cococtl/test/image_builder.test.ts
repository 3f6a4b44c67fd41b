import { describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ImageBuilder } from "../src/image/builder.js";
import { ContainerTool } from "../src/image/container-tool.js";
import { GitOperations } from "../src/git/operations.js";
import { MemoryReporter } from "../src/log/reporter.js";
import { resolveComponent } from "../src/version/resolver.js";
import { BuildError, PatchApplyError, SourceFetchError } from "../src/errors.js";
import type { CocoConfig } from "../src/types/config.js";
import { FakeCluster, FakeGit, tmpDir } from "./fakes.js";

function setup(components: CocoConfig["components"], opts: { fetchAttempts?: number } = {}) {
  const root = tmpDir();
  const git = new FakeGit();
  const cluster = new FakeCluster();
  const reporter = new MemoryReporter();
  const waits: number[] = [];
  let clock = 0;
  const builder = new ImageBuilder({
    git: new GitOperations(git.factory),
    tool: new ContainerTool("nerdctl", cluster.run),
    workRoot: path.join(root, "build"),
    buildNamespace: "default",
    targetArch: "amd64",
    logExcerptLines: 1,
    fetchRetry: { attempts: opts.fetchAttempts ?? 1, backoff_ms: 100 },
    reporter,
    now: () => (clock += 250),
    wait: async (ms) => {
      waits.push(ms);
    },
  });
  const config = { root_dir: root, components };
  return { root, git, cluster, reporter, builder, waits, config };
}

const certManager = {
  version: "v1.14.0",
  source: { repo: "https://example.test/cert-manager.git" },
  dockerfile: "Dockerfile",
};

describe("ImageBuilder", () => {
  it("builds cert-manager v1.14.0 as cert-manager:v1.14.0", async () => {
    const { builder, cluster, config, git } = setup({ "cert-manager": certManager });
    const result = await builder.build(resolveComponent(config, "cert-manager"));

    expect(result.componentName).toBe("cert-manager");
    expect(result.version).toBe("v1.14.0");
    expect(result.imageReference).toBe("cert-manager:v1.14.0");
    expect(result.digest).toBe(cluster.imageIn("default", "cert-manager:v1.14.0"));
    expect(result.buildDurationMs).toBe(250);
    expect(result.logExcerpt).toBe("#9 naming to cert-manager:v1.14.0 done");
    expect(Object.isFrozen(result)).toBe(true);
    expect(git.ops("clone")[0].args).toEqual([
      "https://example.test/cert-manager.git",
      builder.workDirFor(resolveComponent(config, "cert-manager")),
      "--depth",
      "1",
      "--branch",
      "v1.14.0",
    ]);
  });

  it("passes arch, version and configured build args to the build tool", async () => {
    const { builder, cluster, config, root } = setup({
      payload: { ...certManager, version: "v0.11.0", target: "release", build_args: { FLAVOR: "sgx" } },
    });
    const spec = resolveComponent(config, "payload");
    await builder.build(spec);

    expect(cluster.toolCalls("build")[0]).toEqual([
      "--namespace",
      "default",
      "build",
      "--build-arg",
      "TARGETARCH=amd64",
      "--build-arg",
      "VERSION=v0.11.0",
      "--build-arg",
      "SOURCE_REF=v0.11.0",
      "--build-arg",
      "FLAVOR=sgx",
      "--target",
      "release",
      "-f",
      path.join(root, "Dockerfile"),
      "-t",
      "payload:v0.11.0",
      builder.workDirFor(spec),
    ]);
  });

  it("checks out a full commit SHA after a blobless clone", async () => {
    const sha = "0123456789abcdef0123456789abcdef01234567";
    const { builder, git, config } = setup({ payload: { ...certManager, source: { repo: "https://example.test/p.git", ref: sha } } });
    await builder.build(resolveComponent(config, "payload"));

    expect(git.ops("clone")[0].args.slice(2)).toEqual(["--no-checkout"]);
    expect(git.ops("fetch")[0].args).toEqual(["origin", sha, "--depth", "1"]);
    expect(git.ops("checkout")[0].args).toEqual([sha]);
  });

  it("retries a failed fetch with linear backoff", async () => {
    const { builder, git, config, waits } = setup({ "cert-manager": certManager }, { fetchAttempts: 3 });
    git.cloneFailures.set("https://example.test/cert-manager.git", 2);

    const result = await builder.build(resolveComponent(config, "cert-manager"));
    expect(result.imageReference).toBe("cert-manager:v1.14.0");
    expect(git.ops("clone")).toHaveLength(3);
    expect(waits).toEqual([100, 200]);
  });

  it("fails with SourceFetchError and leaves no work tree behind", async () => {
    const { builder, git, config, cluster } = setup({ "cert-manager": certManager });
    git.cloneFailures.set("https://example.test/cert-manager.git", 5);
    const spec = resolveComponent(config, "cert-manager");

    const err = await builder.build(spec).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceFetchError);
    if (err instanceof SourceFetchError) {
      expect(err.component).toBe("cert-manager");
      expect(err.retryable).toBe(true);
      expect(err.detail).toContain("Could not resolve host");
    }
    expect(fs.existsSync(builder.workDirFor(spec))).toBe(false);
    expect(cluster.toolCalls("build")).toHaveLength(0);
  });

  it("checks then applies the patch set in order", async () => {
    const { builder, git, config, root } = setup({
      payload: { ...certManager, patches: ["patches/0001.patch", "patches/0002.patch"] },
    });
    fs.mkdirSync(path.join(root, "patches"));
    fs.writeFileSync(path.join(root, "patches/0001.patch"), "");
    fs.writeFileSync(path.join(root, "patches/0002.patch"), "");

    await builder.build(resolveComponent(config, "payload"));
    const patches = [path.join(root, "patches/0001.patch"), path.join(root, "patches/0002.patch")];
    expect(git.ops("apply").map((c) => c.args)).toEqual([
      ["--check", ...patches],
      ["--whitespace=nowarn", ...patches],
    ]);
  });

  it("stops at PatchApplyError without compiling", async () => {
    const { builder, git, config, root, cluster } = setup({ payload: { ...certManager, patches: ["0001.patch"] } });
    const patch = path.join(root, "0001.patch");
    fs.writeFileSync(patch, "");
    git.badPatches.add(patch);
    const spec = resolveComponent(config, "payload");

    const err = await builder.build(spec).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PatchApplyError);
    if (err instanceof PatchApplyError) {
      expect(err.patches).toEqual([patch]);
      expect(err.detail).toContain("patch does not apply");
    }
    expect(git.ops("apply")).toHaveLength(1);
    expect(fs.existsSync(builder.workDirFor(spec))).toBe(false);
    expect(cluster.toolCalls("build")).toHaveLength(0);
  });

  it("treats a missing patch file as a patch failure", async () => {
    const { builder, config } = setup({ payload: { ...certManager, patches: ["missing.patch"] } });
    await expect(builder.build(resolveComponent(config, "payload"))).rejects.toThrow(PatchApplyError);
  });

  it("wraps build tool failures in BuildError with the tool output", async () => {
    const { builder, cluster, config } = setup({ "cert-manager": certManager });
    cluster.buildFailures.set("cert-manager:v1.14.0", "ERROR: failed to solve: process \"/bin/sh -c make\" did not complete successfully");

    const err = await builder.build(resolveComponent(config, "cert-manager")).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BuildError);
    if (err instanceof BuildError) {
      expect(err.message).toBe("cert-manager: image build failed");
      expect(err.detail).toContain("failed to solve");
      expect(err.stage).toBe("compile");
    }
  });

  it("reports each stage", async () => {
    const { builder, reporter, config, root } = setup({ payload: { ...certManager, patches: ["p.patch"] } });
    fs.writeFileSync(path.join(root, "p.patch"), "");
    await builder.build(resolveComponent(config, "payload"));
    expect(reporter.codes()).toEqual(["FETCH", "PATCH", "COMPILE"]);
  });
});
