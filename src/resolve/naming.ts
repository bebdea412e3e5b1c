import type { Manifest } from "../channel/manifest";

const RUST_VERSION = /^(\d+\.\d+\.\d+)/;

/** `1.75.0` out of the `rust` package's `1.75.0 (82e1608df 2023-12-21)`. */
export function rustVersion(manifest: Manifest): string | null {
  const pkg = manifest.packages.get("rust");
  if (!pkg) return null;
  const match = pkg.version.match(RUST_VERSION);
  return match ? match[1] : null;
}

export function toolchainName(manifest: Manifest, channel: string, forceDate: boolean): string {
  if (!forceDate && channel === "stable") {
    const version = rustVersion(manifest);
    if (version) return version;
  }
  return `${channel}-${manifest.date}`;
}
