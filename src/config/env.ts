import { z } from "zod";
import { DEFAULT_DIST_SERVER } from "../channel/client";
import { InvalidOptionsError } from "../errors";

const EnvSchema = z.object({
  RUSTUP_DIST_SERVER: z.string().url().default(DEFAULT_DIST_SERVER),
  VIABLE_TOOLCHAIN_HOST_TARGET: z
    .string()
    .regex(/^[\w.]+(-[\w.]+){1,3}$/, "Expected a target triple")
    .optional()
});

export interface EnvSettings {
  /** Root of the `dist` tree on the distribution server. */
  distBaseUrl: string;
  hostTarget?: string;
}

export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const result = EnvSchema.safeParse({
    RUSTUP_DIST_SERVER: env.RUSTUP_DIST_SERVER || undefined,
    VIABLE_TOOLCHAIN_HOST_TARGET: env.VIABLE_TOOLCHAIN_HOST_TARGET || undefined
  });
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new InvalidOptionsError(`invalid environment: ${details.join("; ")}`, { cause: result.error });
  }

  return {
    distBaseUrl: `${result.data.RUSTUP_DIST_SERVER.replace(/\/+$/, "")}/dist`,
    hostTarget: result.data.VIABLE_TOOLCHAIN_HOST_TARGET
  };
}
