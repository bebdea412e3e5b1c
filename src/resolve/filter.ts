import type { Manifest } from "../channel/manifest";
import { UnknownProfileError } from "../errors";

export function profilePackages(manifest: Manifest, profile: string): string[] {
  const packages = manifest.profiles.get(profile);
  if (!packages) {
    throw new UnknownProfileError(profile, manifest.date);
  }
  return packages;
}

export function selectPackages(
  packages: readonly string[],
  ignoredPackages: ReadonlySet<string>
): string[] {
  return packages.filter((name) => !ignoredPackages.has(name));
}

/**
 * A manifest is viable when every availability entry it publishes for the
 * selected packages on the given targets says `available = true`.
 *
 * Package/target pairs without an entry are not counted either way, so a
 * manifest with no matching entries at all is viable.
 */
export function isViable(
  manifest: Manifest,
  packages: readonly string[],
  ignoredPackages: ReadonlySet<string>,
  targets: readonly string[]
): boolean {
  for (const name of selectPackages(packages, ignoredPackages)) {
    const pkg = manifest.packages.get(name);
    if (!pkg) continue;
    for (const target of targets) {
      const info = pkg.targets.get(target);
      if (info && !info.available) {
        return false;
      }
    }
  }
  return true;
}
