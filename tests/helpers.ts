import { vi } from "vitest";
import { DistClient } from "../src/channel/client";
import { type Manifest, parseManifest } from "../src/channel/manifest";

export const BASE_URL = "https://dist.example.test/dist";

export interface PackageDoc {
  version?: string;
  targets?: Record<string, boolean>;
}

export interface ManifestDoc {
  date: string;
  packages?: Record<string, PackageDoc>;
  profiles?: Record<string, string[]>;
}

export function manifestToml(doc: ManifestDoc): string {
  const lines = ['manifest-version = "2"', `date = ${JSON.stringify(doc.date)}`, "", "[pkg]"];
  for (const [name, pkg] of Object.entries(doc.packages ?? {})) {
    lines.push("", `[pkg.${name}]`, `version = ${JSON.stringify(pkg.version ?? "1.0.0")}`);
    const targets = Object.entries(pkg.targets ?? {});
    if (targets.length === 0) {
      lines.push(`[pkg.${name}.target]`);
    }
    for (const [target, available] of targets) {
      lines.push(`[pkg.${name}.target.${target}]`, `available = ${available}`);
    }
  }
  lines.push("", "[profiles]");
  for (const [name, packages] of Object.entries(doc.profiles ?? {})) {
    lines.push(`${name} = ${JSON.stringify(packages)}`);
  }
  return lines.join("\n") + "\n";
}

export function buildManifest(doc: ManifestDoc): Manifest {
  return parseManifest(manifestToml(doc));
}

export interface FakeResponse {
  status: number;
  body?: string;
}

/**
 * In-memory distribution server. URLs without an entry answer 404; a thrown
 * `Error` entry makes the request reject. Every response handed out is kept
 * in `responses`.
 */
export function fakeFetch(routes: Record<string, FakeResponse | Error>) {
  const responses: Response[] = [];
  const fetchMock = vi.fn(async (input: Parameters<typeof fetch>[0]): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    if (route instanceof Error) throw route;
    const res = route
      ? new Response(route.body ?? "", { status: route.status })
      : new Response("Not Found", { status: 404, statusText: "Not Found" });
    responses.push(res);
    return res;
  });
  const requestedUrls = (): string[] =>
    fetchMock.mock.calls.map(([input]) => (typeof input === "string" ? input : String(input)));
  return { fetchMock, responses, requestedUrls };
}

export function fakeDist(routes: Record<string, FakeResponse | Error>) {
  const fake = fakeFetch(routes);
  const client = new DistClient({ baseUrl: BASE_URL, fetch: fake.fetchMock });
  return { client, ...fake };
}

export function latestUrl(channel: string): string {
  return `${BASE_URL}/channel-rust-${channel}.toml`;
}

export function datedUrl(channel: string, date: string): string {
  return `${BASE_URL}/${date}/channel-rust-${channel}.toml`;
}

export function serve(doc: ManifestDoc): FakeResponse {
  return { status: 200, body: manifestToml(doc) };
}
