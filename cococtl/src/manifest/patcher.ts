import fs from "node:fs";
import YAML, { isMap, isScalar, isSeq, type Document, type Scalar } from "yaml";
import type { BuildResult } from "../types/build.js";
import type { RuntimeManifest, RuntimeManifestKind } from "../types/manifest.js";
import { ConfigurationError, UnresolvedReferenceError } from "../errors.js";
import { repositoryName } from "./image-ref.js";

export type ManifestTemplate = {
  source: string;
  rawTemplate: string;
};

export type PatchInputs = {
  /** Results of the current run; they win over cached ones. */
  built: readonly BuildResult[];
  cached: readonly BuildResult[];
  /** Every configured component, built or not. */
  knownComponents: readonly string[];
};

type ImageField = { path: string; component: string; scalar: Scalar };

export function loadTemplate(file: string): ManifestTemplate {
  if (!fs.existsSync(file)) {
    throw new ConfigurationError(`Manifest template not found: ${file}`);
  }
  return { source: file, rawTemplate: fs.readFileSync(file, "utf8") };
}

/** `image`, or any key ending in `Image` (payloadImage, ...). */
export function isImageKey(key: string): boolean {
  return key === "image" || /[a-z]Image$/.test(key);
}

function parseDocuments(template: ManifestTemplate): Document[] {
  const docs = YAML.parseAllDocuments(template.rawTemplate).filter((d) => d.contents !== null);
  for (const doc of docs) {
    if (doc.errors.length > 0) {
      throw new ConfigurationError(
        `Invalid YAML in manifest ${template.source}`,
        doc.errors.map((e) => e.message).join("\n"),
      );
    }
  }
  if (docs.length === 0) {
    throw new ConfigurationError(`Manifest ${template.source} is empty`);
  }
  return docs;
}

function manifestKind(docs: Document[], source: string): RuntimeManifestKind {
  const kinds = docs.map((d) => d.get("kind"));
  for (const kind of kinds) {
    if (kind !== "RuntimeClass" && kind !== "CcRuntime") {
      throw new ConfigurationError(`Manifest ${source} contains unsupported kind: ${String(kind)}`);
    }
  }
  return kinds.includes("CcRuntime") ? "CcRuntime" : "RuntimeClass";
}

/** Field paths read `<document index>:<kind>/<name>:<path>`; the index keeps unnamed documents apart. */
function collectImageFields(doc: Document, index: number, known: ReadonlySet<string>): ImageField[] {
  const kind = String(doc.get("kind"));
  const name = String(doc.getIn(["metadata", "name"]) ?? "");
  const fields: ImageField[] = [];

  const walk = (node: unknown, trail: string): void => {
    if (isMap(node)) {
      for (const pair of node.items) {
        const key = isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
        const at = trail ? `${trail}.${key}` : key;
        const value = pair.value;
        if (isImageKey(key) && isScalar(value) && typeof value.value === "string") {
          const component = repositoryName(value.value);
          if (known.has(component)) fields.push({ path: `${index}:${kind}/${name}:${at}`, component, scalar: value });
        } else {
          walk(value, at);
        }
      }
    } else if (isSeq(node)) {
      node.items.forEach((item, i) => walk(item, `${trail}[${i}]`));
    }
  };

  walk(doc.contents, "");
  return fields;
}

/**
 * Point every image field of a known component at its locally built reference.
 *
 * Pure: the same template and results always render the same manifest. Fields
 * whose image belongs to no configured component are left alone.
 */
export function patchManifest(template: ManifestTemplate, inputs: PatchInputs): RuntimeManifest {
  const docs = parseDocuments(template);
  const kind = manifestKind(docs, template.source);

  const refs = new Map<string, string>();
  for (const r of inputs.cached) refs.set(r.componentName, r.imageReference);
  for (const r of inputs.built) refs.set(r.componentName, r.imageReference);

  const known = new Set(inputs.knownComponents);
  const fields = docs.flatMap((doc, i) => collectImageFields(doc, i, known));

  const missing = [...new Set(fields.filter((f) => !refs.has(f.component)).map((f) => f.component))].sort();
  if (missing.length > 0) {
    throw new UnresolvedReferenceError(missing, template.source);
  }

  const resolvedImageRefs: Record<string, string> = {};
  for (const field of fields) {
    const ref = refs.get(field.component);
    if (ref === undefined) continue;
    field.scalar.value = ref;
    resolvedImageRefs[field.path] = ref;
  }

  return {
    kind,
    source: template.source,
    rawTemplate: template.rawTemplate,
    resolvedImageRefs,
    rendered: docs.map((d) => d.toString({ lineWidth: 0 })).join(""),
  };
}
