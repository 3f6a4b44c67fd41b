import os from "node:os";
import type { TargetArch } from "../types/config.js";

export type HostSystem = "darwin" | "linux" | "wsl" | "windows" | "other";

export type PlatformInfo = {
  system: HostSystem;
  machine: string;
};

/** Host OS and CPU; WSL is told apart from plain Linux by its kernel release. */
export function detectPlatform(
  platform: NodeJS.Platform = os.platform(),
  machine: string = os.arch(),
  release: string = os.release(),
): PlatformInfo {
  let system: HostSystem;
  if (platform === "linux") {
    system = release.toLowerCase().includes("microsoft") ? "wsl" : "linux";
  } else if (platform === "darwin") {
    system = "darwin";
  } else if (platform === "win32") {
    system = "windows";
  } else {
    system = "other";
  }
  return { system, machine };
}

/** Image architecture for builds: arm64 on ARM hosts, amd64 everywhere else. */
export function targetArch(configured: TargetArch, machine: string): "amd64" | "arm64" {
  if (configured !== "auto") return configured;
  return machine === "arm64" || machine === "aarch64" ? "arm64" : "amd64";
}
