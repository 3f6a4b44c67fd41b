import type { BuildResult } from "../types/build.js";

/**
 * Build results of this process. Filled by `build`, read by `setup`, gone when
 * the process exits; nothing is written to disk.
 */
export class BuildCache {
  private readonly results = new Map<string, BuildResult>();

  put(result: BuildResult): void {
    this.results.set(result.componentName, result);
  }

  get(component: string): BuildResult | undefined {
    return this.results.get(component);
  }

  all(): BuildResult[] {
    return [...this.results.values()].sort((a, b) => a.componentName.localeCompare(b.componentName));
  }

  get size(): number {
    return this.results.size;
  }

  clear(): void {
    this.results.clear();
  }
}
