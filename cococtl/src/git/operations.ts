import { simpleGit } from "simple-git";
import fs from "node:fs";
import path from "node:path";

/** The slice of simple-git the source stages use. */
export type GitClient = {
  clone(repoPath: string, localPath: string, options: string[]): Promise<unknown>;
  fetch(remote: string, ref: string, options: string[]): Promise<unknown>;
  checkout(ref: string): Promise<unknown>;
  applyPatch(patches: string[], options: string[]): Promise<unknown>;
};

export type GitFactory = (baseDir: string) => GitClient;

const FULL_SHA = /^[0-9a-f]{40}$/i;

/**
 * Source checkout and patching on top of simple-git.
 */
export class GitOperations {
  private readonly gitFor: GitFactory;

  constructor(gitFor?: GitFactory) {
    this.gitFor = gitFor ?? ((baseDir) => simpleGit(baseDir));
  }

  /**
   * Clone `repo` at `ref` into `dest`, which must not exist yet.
   * Tags and branches are cloned shallow; a full commit SHA is fetched and checked out.
   */
  async cloneAt(repo: string, ref: string, dest: string): Promise<void> {
    const parent = path.dirname(dest);
    fs.mkdirSync(parent, { recursive: true });

    if (FULL_SHA.test(ref)) {
      await this.gitFor(parent).clone(repo, dest, ["--no-checkout"]);
      const git = this.gitFor(dest);
      await git.fetch("origin", ref, ["--depth", "1"]);
      await git.checkout(ref);
      return;
    }

    await this.gitFor(parent).clone(repo, dest, ["--depth", "1", "--branch", ref]);
  }

  /** Dry-run every patch against the tree in `dir`. */
  async checkPatches(dir: string, patches: readonly string[]): Promise<void> {
    if (patches.length === 0) return;
    await this.gitFor(dir).applyPatch([...patches], ["--check"]);
  }

  /** Apply patches in order with a single `git apply`, which leaves the tree untouched on failure. */
  async applyPatches(dir: string, patches: readonly string[]): Promise<void> {
    if (patches.length === 0) return;
    await this.gitFor(dir).applyPatch([...patches], ["--whitespace=nowarn"]);
  }
}
