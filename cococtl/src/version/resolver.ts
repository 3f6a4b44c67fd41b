import type { CocoConfig } from "../types/config.js";
import type { ComponentSpec } from "../types/component.js";
import { ConfigurationError } from "../errors.js";
import { resolvePath } from "../config/loader.js";

/** Semantic-version-like: v1.14.0, 0.11.0, v0.12.0-rc.1. */
export const VERSION_PATTERN = /^v?\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.-]+)?$/;

type ResolverConfig = Pick<CocoConfig, "components" | "root_dir">;

/** Declared version of a component. */
export function resolveVersion(config: Pick<CocoConfig, "components">, component: string): string {
  const entry = Object.hasOwn(config.components, component) ? config.components[component] : undefined;
  if (!entry) {
    throw new ConfigurationError(`Unknown component: ${component}`);
  }
  const version: unknown = entry.version;
  if (typeof version !== "string" || version.length === 0) {
    throw new ConfigurationError(`Component ${component} has no version`);
  }
  if (!VERSION_PATTERN.test(version)) {
    throw new ConfigurationError(`Component ${component} has a malformed version: ${version}`);
  }
  return version;
}

/** Frozen ComponentSpec for one run; relative paths resolve against the config root. */
export function resolveComponent(config: ResolverConfig, component: string): ComponentSpec {
  const declaredVersion = resolveVersion(config, component);
  const entry = config.components[component];

  return Object.freeze({
    name: component,
    declaredVersion,
    sourceRef: entry.source.ref ?? declaredVersion,
    source: Object.freeze({ repo: entry.source.repo }),
    patchSet: Object.freeze((entry.patches ?? []).map((p) => resolvePath(config, p))),
    buildStages: Object.freeze({
      dockerfile: resolvePath(config, entry.dockerfile),
      context: entry.context ? resolvePath(config, entry.context) : null,
      target: entry.target ?? null,
      args: Object.freeze({ ...(entry.build_args ?? {}) }),
    }),
  });
}

/** Configured component names, sorted. */
export function componentNames(config: Pick<CocoConfig, "components">): string[] {
  return Object.keys(config.components).sort();
}

/** Version-qualified local tag. */
export function imageReferenceFor(name: string, version: string): string {
  return `${name}:${version}`;
}
