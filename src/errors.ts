export class ManifestRequestError extends Error {
  name = "ManifestRequestError";

  constructor(
    message: string,
    readonly url: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class ManifestFormatError extends Error {
  name = "ManifestFormatError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class ChannelNotFoundError extends Error {
  name = "ChannelNotFoundError";

  constructor(readonly channel: string) {
    super(`no manifest found for release channel ${channel}`);
  }
}

export class UnknownProfileError extends Error {
  name = "UnknownProfileError";

  constructor(
    readonly profile: string,
    readonly date: string
  ) {
    super(`profile ${profile} is not defined in the manifest for ${date}`);
  }
}

export class NoViableBuildError extends Error {
  name = "NoViableBuildError";

  constructor(readonly channel: string) {
    super(`no viable ${channel} build found`);
  }
}

export class UnsupportedHostError extends Error {
  name = "UnsupportedHostError";

  constructor(platform: string, arch: string) {
    super(`cannot determine a target triple for ${platform}/${arch}; set VIABLE_TOOLCHAIN_HOST_TARGET`);
  }
}

export class InvalidOptionsError extends Error {
  name = "InvalidOptionsError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Renders an error and its `cause` chain, one line per link:
 * the top-level message first, then `\tcaused by: <message>` for each cause.
 */
export function formatErrorChain(error: unknown): string {
  const lines: string[] = [];
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    const message = current instanceof Error ? current.message : String(current);
    lines.push(lines.length === 0 ? message : `\tcaused by: ${message}`);
    current = current instanceof Error ? current.cause : undefined;
  }
  return lines.join("\n");
}
