import { ManifestFormatError, ManifestRequestError } from "../errors";
import { type Manifest, parseManifest } from "./manifest";

export const DEFAULT_DIST_SERVER = "https://static.rust-lang.org";

export interface DistClientConfig {
  /** Root of the `dist` tree, e.g. `https://static.rust-lang.org/dist`. */
  baseUrl: string;
  fetch?: typeof fetch;
}

export class DistClient {
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(config: DistClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  latestManifestUrl(channel: string): string {
    return `${this.baseUrl}/channel-rust-${channel}.toml`;
  }

  datedManifestUrl(channel: string, date: string): string {
    return `${this.baseUrl}/${date}/channel-rust-${channel}.toml`;
  }

  fetchLatest(channel: string): Promise<Manifest | null> {
    return this.fetchManifest(this.latestManifestUrl(channel));
  }

  fetchDated(channel: string, date: string): Promise<Manifest | null> {
    return this.fetchManifest(this.datedManifestUrl(channel, date));
  }

  /** Resolves to `null` when the server answers 404 (nothing published at that URL). */
  async fetchManifest(url: string): Promise<Manifest | null> {
    let res: Response;
    try {
      res = await this.fetchImpl(url);
    } catch (error) {
      throw new ManifestRequestError(`error making request to ${url}`, url, { cause: error });
    }

    if (res.status === 404) {
      await this.discardBody(res, url);
      return null;
    }
    if (!res.ok) {
      await this.discardBody(res, url);
      throw new ManifestRequestError(
        `error getting manifest from ${url}: ${res.status} ${res.statusText}`.trimEnd(),
        url
      );
    }

    let text: string;
    try {
      text = await res.text();
    } catch (error) {
      throw new ManifestRequestError(`error downloading manifest from ${url}`, url, { cause: error });
    }

    try {
      return parseManifest(text);
    } catch (error) {
      throw new ManifestFormatError(`error reading manifest from ${url}`, { cause: error });
    }
  }

  // The connection is only released once the body has been read to the end.
  private async discardBody(res: Response, url: string): Promise<void> {
    try {
      await res.arrayBuffer();
    } catch (error) {
      throw new ManifestRequestError(`error downloading response from ${url}`, url, { cause: error });
    }
  }
}
