import { loadEnvSettings } from "../config/env";
import type { ResolveOptions } from "../config/options";
import { detectHostTarget, ignoredPackagesFor, selectTargets, targetsFor } from "../config/targets";
import { DistClient } from "../channel/client";
import { NoViableBuildError } from "../errors";
import { toolchainName } from "../resolve/naming";
import { findLatestViableManifest } from "../resolve/search";

export interface ResolveContext {
  client: DistClient;
  /** Called only when the host's own target is selected. */
  hostTarget: () => string;
  log?: (message: string) => void;
}

export async function resolveToolchain(
  options: ResolveOptions,
  context: ResolveContext
): Promise<string> {
  const selection = selectTargets(options.targets, context.hostTarget);
  const found = await findLatestViableManifest(context.client, {
    channel: options.channel,
    profile: options.profile,
    maxAge: options.maxAge,
    ignoredPackages: ignoredPackagesFor(selection),
    targets: targetsFor(selection),
    log: context.log
  });
  if (!found) {
    throw new NoViableBuildError(options.channel);
  }
  return toolchainName(found.manifest, found.channel, options.forceDate);
}

export async function runResolveCommand(
  options: ResolveOptions,
  env: NodeJS.ProcessEnv = process.env,
  detectHost: () => string = () => detectHostTarget()
): Promise<void> {
  const settings = loadEnvSettings(env);
  const client = new DistClient({ baseUrl: settings.distBaseUrl });

  const name = await resolveToolchain(options, {
    client,
    hostTarget: () => settings.hostTarget ?? detectHost(),
    log: options.verbose ? (message) => console.error(message) : undefined
  });
  console.log(name);
}
