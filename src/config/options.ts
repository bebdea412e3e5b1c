import { z } from "zod";
import { InvalidOptionsError } from "../errors";

export const PROFILES = ["complete", "default", "minimal"] as const;
export const TARGET_MODES = ["all", "current"] as const;

export const ResolveOptionsSchema = z.object({
  channel: z.string().min(1).default("stable"),
  profile: z.enum(PROFILES).default("default"),
  maxAge: z.coerce.number().int().positive().default(90),
  targets: z.enum(TARGET_MODES).default("all"),
  forceDate: z.boolean().default(false),
  verbose: z.boolean().default(false)
});

export type ResolveOptions = z.infer<typeof ResolveOptionsSchema>;
export type Profile = ResolveOptions["profile"];

export function parseResolveOptions(input: unknown): ResolveOptions {
  const result = ResolveOptionsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new InvalidOptionsError(`invalid options: ${details}`, { cause: result.error });
  }
  return result.data;
}
