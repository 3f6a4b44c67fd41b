import { describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { isImageKey, loadTemplate, patchManifest, type ManifestTemplate } from "../src/manifest/patcher.js";
import { repositoryName } from "../src/manifest/image-ref.js";
import { ConfigurationError, UnresolvedReferenceError } from "../src/errors.js";
import type { BuildResult } from "../src/types/build.js";
import { tmpDir } from "./fakes.js";

function built(name: string, version: string): BuildResult {
  return {
    componentName: name,
    version,
    imageReference: `${name}:${version}`,
    digest: `sha256:${name}`,
    buildDurationMs: 0,
    logExcerpt: "",
  };
}

const CC_RUNTIME: ManifestTemplate = {
  source: "ccruntime.yaml",
  rawTemplate: [
    "apiVersion: confidentialcontainers.org/v1beta1",
    "kind: CcRuntime",
    "metadata:",
    "  name: cc-runtime",
    "spec:",
    "  runtimeName: kata",
    "  config:",
    "    payloadImage: quay.io/confidential-containers/payload:latest # replaced",
    "    preInstall:",
    "      image: quay.io/confidential-containers/harbor-core:v2.10.0",
    "    postUninstall:",
    "      image: quay.io/confidential-containers/container-engine-for-cc-payload:latest",
    "",
  ].join("\n"),
};

const KNOWN = ["harbor-core", "payload"];

describe("repositoryName", () => {
  it("strips registry, path, tag and digest", () => {
    expect(repositoryName("quay.io/confidential-containers/payload:v0.11.0")).toBe("payload");
    expect(repositoryName("payload@sha256:abc")).toBe("payload");
    expect(repositoryName("localhost:5000/team/harbor-core")).toBe("harbor-core");
    expect(repositoryName("nginx")).toBe("nginx");
  });
});

describe("isImageKey", () => {
  it("matches image and *Image keys", () => {
    expect(isImageKey("image")).toBe(true);
    expect(isImageKey("payloadImage")).toBe(true);
    expect(isImageKey("Image")).toBe(false);
    expect(isImageKey("imagePullPolicy")).toBe(false);
  });
});

describe("patchManifest", () => {
  it("substitutes every known component with its local reference", () => {
    const m = patchManifest(CC_RUNTIME, {
      built: [built("payload", "v0.11.0"), built("harbor-core", "v2.10.0")],
      cached: [],
      knownComponents: KNOWN,
    });

    expect(m.kind).toBe("CcRuntime");
    expect(m.resolvedImageRefs).toEqual({
      "0:CcRuntime/cc-runtime:spec.config.payloadImage": "payload:v0.11.0",
      "0:CcRuntime/cc-runtime:spec.config.preInstall.image": "harbor-core:v2.10.0",
    });
    const doc = YAML.parse(m.rendered);
    expect(doc.spec.config.payloadImage).toBe("payload:v0.11.0");
    expect(doc.spec.config.preInstall.image).toBe("harbor-core:v2.10.0");
    expect(m.rawTemplate).toBe(CC_RUNTIME.rawTemplate);
  });

  it("leaves images of unconfigured components untouched", () => {
    const m = patchManifest(CC_RUNTIME, { built: [built("payload", "v0.11.0"), built("harbor-core", "v2.10.0")], cached: [], knownComponents: KNOWN });
    expect(YAML.parse(m.rendered).spec.config.postUninstall.image).toBe(
      "quay.io/confidential-containers/container-engine-for-cc-payload:latest",
    );
  });

  it("keeps comments", () => {
    const m = patchManifest(CC_RUNTIME, { built: [built("payload", "v0.11.0"), built("harbor-core", "v2.10.0")], cached: [], knownComponents: KNOWN });
    expect(m.rendered).toContain("payloadImage: payload:v0.11.0 # replaced");
  });

  it("is idempotent: same inputs, same output", () => {
    const inputs = { built: [built("payload", "v0.11.0")], cached: [built("harbor-core", "v2.10.0")], knownComponents: KNOWN };
    expect(patchManifest(CC_RUNTIME, inputs).rendered).toBe(patchManifest(CC_RUNTIME, inputs).rendered);
  });

  it("re-patching a rendered manifest changes nothing", () => {
    const inputs = { built: [built("payload", "v0.11.0"), built("harbor-core", "v2.10.0")], cached: [], knownComponents: KNOWN };
    const once = patchManifest(CC_RUNTIME, inputs);
    const twice = patchManifest({ source: "ccruntime.yaml", rawTemplate: once.rendered }, inputs);
    expect(twice.rendered).toBe(once.rendered);
  });

  it("prefers results of the current run over cached ones", () => {
    const m = patchManifest(CC_RUNTIME, {
      built: [built("payload", "v0.11.1")],
      cached: [built("payload", "v0.11.0"), built("harbor-core", "v2.10.0")],
      knownComponents: KNOWN,
    });
    expect(m.resolvedImageRefs["0:CcRuntime/cc-runtime:spec.config.payloadImage"]).toBe("payload:v0.11.1");
  });

  it("raises UnresolvedReferenceError naming every unbuilt component", () => {
    const err = (() => {
      try {
        patchManifest(CC_RUNTIME, { built: [built("payload", "v0.11.0")], cached: [], knownComponents: KNOWN });
        return null;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(UnresolvedReferenceError);
    if (err instanceof UnresolvedReferenceError) {
      expect(err.components).toEqual(["harbor-core"]);
      expect(err.message).toBe("ccruntime.yaml references components with no build result: harbor-core");
    }
  });

  it("raises only when a referenced component lacks a result", () => {
    const template: ManifestTemplate = {
      source: "rc.yaml",
      rawTemplate: "apiVersion: node.k8s.io/v1\nkind: RuntimeClass\nmetadata:\n  name: kata\nhandler: kata\n",
    };
    const m = patchManifest(template, { built: [], cached: [], knownComponents: KNOWN });
    expect(m.kind).toBe("RuntimeClass");
    expect(m.resolvedImageRefs).toEqual({});
  });

  it("walks lists and multiple documents", () => {
    const template: ManifestTemplate = {
      source: "multi.yaml",
      rawTemplate: [
        "kind: RuntimeClass",
        "metadata:",
        "  name: kata",
        "handler: kata",
        "---",
        "kind: CcRuntime",
        "metadata:",
        "  name: cc",
        "spec:",
        "  steps:",
        "    - image: registry.local/payload:dev",
        "    - image: busybox",
        "",
      ].join("\n"),
    };
    const m = patchManifest(template, { built: [built("payload", "v0.11.0")], cached: [], knownComponents: KNOWN });
    expect(m.kind).toBe("CcRuntime");
    expect(m.resolvedImageRefs).toEqual({ "1:CcRuntime/cc:spec.steps[0].image": "payload:v0.11.0" });
    const docs = YAML.parseAllDocuments(m.rendered).map((d) => d.toJS());
    expect(docs).toHaveLength(2);
    expect(docs[1].spec.steps).toEqual([{ image: "payload:v0.11.0" }, { image: "busybox" }]);
  });

  it("keeps image fields of unnamed documents of the same kind apart", () => {
    const template: ManifestTemplate = {
      source: "unnamed.yaml",
      rawTemplate: [
        "kind: CcRuntime",
        "spec:",
        "  payloadImage: quay.io/x/payload:latest",
        "---",
        "kind: CcRuntime",
        "spec:",
        "  payloadImage: quay.io/x/harbor-core:latest",
        "",
      ].join("\n"),
    };
    const m = patchManifest(template, {
      built: [built("payload", "v0.11.0"), built("harbor-core", "v2.10.0")],
      cached: [],
      knownComponents: KNOWN,
    });
    expect(m.resolvedImageRefs).toEqual({
      "0:CcRuntime/:spec.payloadImage": "payload:v0.11.0",
      "1:CcRuntime/:spec.payloadImage": "harbor-core:v2.10.0",
    });
  });

  it("rejects unsupported kinds and invalid YAML", () => {
    const inputs = { built: [], cached: [], knownComponents: KNOWN };
    expect(() => patchManifest({ source: "d.yaml", rawTemplate: "kind: Deployment\nmetadata:\n  name: x\n" }, inputs)).toThrow(
      "Manifest d.yaml contains unsupported kind: Deployment",
    );
    expect(() => patchManifest({ source: "bad.yaml", rawTemplate: "kind: [RuntimeClass\n" }, inputs)).toThrow(ConfigurationError);
    expect(() => patchManifest({ source: "empty.yaml", rawTemplate: "" }, inputs)).toThrow("Manifest empty.yaml is empty");
  });
});

describe("loadTemplate", () => {
  it("reads a template from disk", () => {
    const file = path.join(tmpDir(), "rc.yaml");
    fs.writeFileSync(file, "kind: RuntimeClass\n");
    expect(loadTemplate(file)).toEqual({ source: file, rawTemplate: "kind: RuntimeClass\n" });
  });

  it("fails on a missing template", () => {
    expect(() => loadTemplate("/nonexistent/ccruntime.yaml")).toThrow("Manifest template not found: /nonexistent/ccruntime.yaml");
  });
});
