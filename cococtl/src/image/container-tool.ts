import { runTool, type ToolOutput, type ToolRunner } from "../exec/tool.js";
import { ToolError } from "../errors.js";

export type ImageBuildRequest = {
  dockerfile: string;
  context: string;
  tag: string;
  target: string | null;
  buildArgs: Record<string, string>;
};

/**
 * nerdctl-style container CLI scoped to containerd namespaces.
 */
export class ContainerTool {
  constructor(
    private readonly binary: string,
    private readonly run: ToolRunner = runTool,
  ) {}

  async build(namespace: string, req: ImageBuildRequest, signal?: AbortSignal): Promise<ToolOutput> {
    const args = ["--namespace", namespace, "build"];
    for (const [key, value] of Object.entries(req.buildArgs)) {
      args.push("--build-arg", `${key}=${value}`);
    }
    if (req.target) args.push("--target", req.target);
    args.push("-f", req.dockerfile, "-t", req.tag, req.context);
    return this.run(this.binary, args, { signal });
  }

  /** Image ID (digest) of `ref`, or null when the namespace has no such image. */
  async inspectDigest(namespace: string, ref: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const { stdout } = await this.run(this.binary, ["--namespace", namespace, "image", "inspect", "--format", "{{.Id}}", ref], {
        signal,
      });
      const digest = stdout.trim();
      return digest.length > 0 ? digest : null;
    } catch (e) {
      if (e instanceof ToolError && isNoSuchImage(e)) return null;
      throw e;
    }
  }

  async save(namespace: string, ref: string, archive: string, signal?: AbortSignal): Promise<void> {
    await this.run(this.binary, ["--namespace", namespace, "save", "-o", archive, ref], { signal });
  }

  async load(namespace: string, archive: string, signal?: AbortSignal): Promise<void> {
    await this.run(this.binary, ["--namespace", namespace, "load", "-i", archive], { signal });
  }

  async version(): Promise<string> {
    const { stdout } = await this.run(this.binary, ["--version"]);
    return stdout.trim();
  }
}

function isNoSuchImage(e: ToolError): boolean {
  return /no such (image|object)|not found/i.test(e.output);
}
