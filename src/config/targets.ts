import { UnsupportedHostError } from "../errors";

export type TargetMode = "all" | "current";

export type TargetSelection = { mode: "all" } | { mode: "current"; hostTarget: string };

export type LinuxLibc = "gnu" | "musl";

/** Rust Tier 1 platforms, see https://doc.rust-lang.org/nightly/rustc/platform-support.html */
export const TIER_1_TARGETS: readonly string[] = [
  "aarch64-apple-darwin",
  "aarch64-pc-windows-msvc",
  "aarch64-unknown-linux-gnu",
  "i686-pc-windows-msvc",
  "i686-unknown-linux-gnu",
  "x86_64-pc-windows-gnu",
  "x86_64-pc-windows-msvc",
  "x86_64-unknown-linux-gnu"
];

const IGNORED_PACKAGES = ["lldb-preview", "rust-mingw"] as const;

// Packages that only ship for a handful of hosts; on those hosts they are checked like any other.
const HOST_PACKAGES: Record<string, readonly string[]> = {
  "i686-apple-darwin": ["lldb-preview"],
  "x86_64-apple-darwin": ["lldb-preview"],
  "i686-pc-windows-gnu": ["rust-mingw"],
  "x86_64-pc-windows-gnu": ["rust-mingw"]
};

const ARCHES: Record<string, string> = {
  x64: "x86_64",
  arm64: "aarch64",
  ia32: "i686"
};

const PLATFORMS: Record<string, string> = {
  darwin: "apple-darwin",
  win32: "pc-windows-msvc"
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Node's diagnostic report only carries `glibcVersionRuntime` when linked against glibc. */
export function detectLinuxLibc(report: unknown = process.report.getReport()): LinuxLibc {
  const header = isRecord(report) ? report.header : undefined;
  return isRecord(header) && typeof header.glibcVersionRuntime === "string" ? "gnu" : "musl";
}

export function detectHostTarget(
  platform: string = process.platform,
  arch: string = process.arch,
  libc?: LinuxLibc
): string {
  const cpu = Object.hasOwn(ARCHES, arch) ? ARCHES[arch] : undefined;
  if (cpu && platform === "linux") {
    return `${cpu}-unknown-linux-${libc ?? detectLinuxLibc()}`;
  }
  const os = Object.hasOwn(PLATFORMS, platform) ? PLATFORMS[platform] : undefined;
  if (!cpu || !os) {
    throw new UnsupportedHostError(platform, arch);
  }
  return `${cpu}-${os}`;
}

/** Only `current` mode needs the host triple, so `hostTarget` is not called otherwise. */
export function selectTargets(mode: TargetMode, hostTarget: () => string): TargetSelection {
  return mode === "all" ? { mode } : { mode, hostTarget: hostTarget() };
}

export function ignoredPackagesFor(selection: TargetSelection): ReadonlySet<string> {
  const ignored = new Set<string>(IGNORED_PACKAGES);
  if (selection.mode === "current" && Object.hasOwn(HOST_PACKAGES, selection.hostTarget)) {
    for (const pkg of HOST_PACKAGES[selection.hostTarget]) {
      ignored.delete(pkg);
    }
  }
  return ignored;
}

export function targetsFor(selection: TargetSelection): string[] {
  return selection.mode === "all" ? [...TIER_1_TARGETS] : [selection.hostTarget];
}
