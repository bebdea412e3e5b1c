import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { ManifestFormatError } from "../errors";
import { formatIsoDate, isIsoDate } from "../utils/date";

const ManifestDateSchema = z.union([
  z.string().refine(isIsoDate, { message: "Expected a YYYY-MM-DD date" }),
  z.date().transform(formatIsoDate)
]);

const PackageInfoSchema = z.object({
  available: z.boolean()
});

const PackageTargetsSchema = z
  .object({
    version: z.string(),
    target: z.record(PackageInfoSchema)
  })
  .transform((pkg) => ({
    version: pkg.version,
    targets: new Map(Object.entries(pkg.target))
  }));

/**
 * One day's channel manifest (`channel-rust-<channel>.toml`), reduced to the
 * fields the resolver reads. Unknown keys are dropped.
 */
export const ManifestSchema = z
  .object({
    date: ManifestDateSchema,
    pkg: z.record(PackageTargetsSchema),
    profiles: z.record(z.array(z.string()))
  })
  .transform((manifest) => ({
    date: manifest.date,
    packages: new Map(Object.entries(manifest.pkg)),
    profiles: new Map(Object.entries(manifest.profiles))
  }));

export type Manifest = z.output<typeof ManifestSchema>;
export type PackageTargets = z.output<typeof PackageTargetsSchema>;
export type PackageInfo = z.output<typeof PackageInfoSchema>;

export function parseManifest(text: string): Manifest {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (error) {
    throw new ManifestFormatError("manifest is not valid TOML", { cause: error });
  }

  const result = ManifestSchema.safeParse(document);
  if (!result.success) {
    throw new ManifestFormatError("manifest does not match the expected layout", {
      cause: result.error
    });
  }
  return result.data;
}
