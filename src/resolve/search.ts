import type { DistClient } from "../channel/client";
import type { Manifest } from "../channel/manifest";
import { ChannelNotFoundError } from "../errors";
import { shiftIsoDate } from "../utils/date";
import { isViable, profilePackages } from "./filter";

export interface SearchOptions {
  channel: string;
  profile: string;
  /** Days to look back from the latest release, the latest day included. */
  maxAge: number;
  ignoredPackages: ReadonlySet<string>;
  targets: readonly string[];
  log?: (message: string) => void;
}

export interface ViableManifest {
  manifest: Manifest;
  channel: string;
  profile: string;
}

/** Yields `anchor - 1` back to `anchor - (maxAge - 1)`, newest first. */
export function* priorDates(anchor: string, maxAge: number): Generator<string> {
  for (let day = 1; day < maxAge; day++) {
    yield shiftIsoDate(anchor, -day);
  }
}

/**
 * Walks back from the channel's latest manifest one day at a time and returns
 * the first manifest that passes {@link isViable}. Requests are issued one at a
 * time and stop at the first hit. Resolves to `null` when no examined date
 * qualifies.
 */
export async function findLatestViableManifest(
  client: DistClient,
  options: SearchOptions
): Promise<ViableManifest | null> {
  const { channel, profile, ignoredPackages, targets } = options;
  const log = options.log ?? (() => undefined);

  const check = (manifest: Manifest): ViableManifest | null => {
    const packages = profilePackages(manifest, profile);
    if (isViable(manifest, packages, ignoredPackages, targets)) {
      log(`${channel} ${manifest.date}: viable`);
      return { manifest, channel, profile };
    }
    log(`${channel} ${manifest.date}: missing packages for the ${profile} profile`);
    return null;
  };

  const latest = await client.fetchLatest(channel);
  if (!latest) {
    throw new ChannelNotFoundError(channel);
  }

  const fromLatest = check(latest);
  if (fromLatest) return fromLatest;

  for (const date of priorDates(latest.date, options.maxAge)) {
    const manifest = await client.fetchDated(channel, date);
    if (!manifest) {
      log(`${channel} ${date}: no manifest published`);
      continue;
    }
    const found = check(manifest);
    if (found) return found;
  }

  return null;
}
