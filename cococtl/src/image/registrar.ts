import fs from "node:fs";
import path from "node:path";
import type { BuildResult, RegistrationOutcome } from "../types/build.js";
import type { RetryPolicy } from "../types/config.js";
import { ContainerTool } from "./container-tool.js";
import { NO_RETRY, sleep, withRetry, type Sleep } from "../core/retry.js";
import { RegistrationError, errorDetail, throwIfCancelled } from "../errors.js";

export type RegistrarOptions = {
  tool: ContainerTool;
  buildNamespace: string;
  runtimeNamespace: string;
  /** Scratch directory for image archives moved between namespaces. */
  stagingDir: string;
  retry?: RetryPolicy;
  wait?: Sleep;
};

/**
 * Makes built images resolvable by the cluster's container runtime without a
 * registry push. Images built straight into the runtime namespace only need
 * verifying; others are exported and loaded across.
 */
export class LocalImageRegistrar {
  /** imageReference → digest registered during this process. */
  private readonly registered = new Map<string, string>();

  constructor(private readonly opts: RegistrarOptions) {}

  get namespace(): string {
    return this.opts.runtimeNamespace;
  }

  async register(result: BuildResult, signal?: AbortSignal): Promise<RegistrationOutcome> {
    const ref = result.imageReference;
    const ns = this.opts.runtimeNamespace;
    throwIfCancelled(signal, "register");

    if (this.registered.get(ref) === result.digest) {
      return { imageReference: ref, namespace: ns, changed: false };
    }

    const changed = await withRetry(
      () => this.transfer(result, signal),
      this.opts.retry ?? NO_RETRY,
      (e) => e instanceof RegistrationError,
      this.opts.wait ?? sleep,
      signal,
    );
    this.registered.set(ref, result.digest);
    return { imageReference: ref, namespace: ns, changed };
  }

  /** Whether `ref` is present in the runtime namespace. */
  async imageExists(ref: string, signal?: AbortSignal): Promise<boolean> {
    return (await this.digestIn(this.opts.runtimeNamespace, ref, signal)) !== null;
  }

  private async transfer(result: BuildResult, signal?: AbortSignal): Promise<boolean> {
    const { buildNamespace, runtimeNamespace } = this.opts;
    const ref = result.imageReference;

    const present = await this.digestIn(runtimeNamespace, ref, signal);
    if (buildNamespace === runtimeNamespace) {
      if (present === null) {
        throw new RegistrationError(`${ref} is not present in namespace ${runtimeNamespace}`, ref);
      }
      return false;
    }
    if (present === result.digest) return false;

    fs.mkdirSync(this.opts.stagingDir, { recursive: true });
    const archive = path.join(this.opts.stagingDir, `${ref.replace(/[^A-Za-z0-9._-]/g, "_")}.tar`);
    try {
      await this.opts.tool.save(buildNamespace, ref, archive, signal);
      await this.opts.tool.load(runtimeNamespace, archive, signal);
    } catch (e) {
      throw new RegistrationError(`could not load ${ref} into namespace ${runtimeNamespace}`, ref, errorDetail(e));
    } finally {
      fs.rmSync(archive, { force: true });
    }

    if ((await this.digestIn(runtimeNamespace, ref, signal)) === null) {
      throw new RegistrationError(`${ref} still missing from namespace ${runtimeNamespace} after load`, ref);
    }
    return true;
  }

  private async digestIn(namespace: string, ref: string, signal?: AbortSignal): Promise<string | null> {
    try {
      return await this.opts.tool.inspectDigest(namespace, ref, signal);
    } catch (e) {
      throw new RegistrationError(`image namespace ${namespace} is unreachable`, ref, errorDetail(e));
    }
  }
}
