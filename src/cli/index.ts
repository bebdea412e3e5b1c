#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, Option } from "commander";
import pkg from "../../package.json";
import { PROFILES, TARGET_MODES, parseResolveOptions } from "../config/options";
import { runResolveCommand } from "../commands/resolve";
import { formatErrorChain } from "../errors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.VIABLE_TOOLCHAIN_ENV_FILE ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("viable-toolchain")
  .description("Determines the last known complete build of a Rust toolchain.")
  .version(pkg.version)
  .option("--env-file <path>", "Path to .env file (overrides VIABLE_TOOLCHAIN_ENV_FILE)", envPath)
  .option("-c, --channel <name>", "Release channel to use.", "stable")
  .addOption(
    new Option("-p, --profile <profile>", "Which package profile to use.")
      .choices(PROFILES)
      .default("default")
  )
  .option(
    "-a, --max-age <days>",
    "Number of days back to search for viable builds, relative to the latest release of the channel.",
    "90"
  )
  .addOption(
    new Option(
      "-t, --targets <set>",
      "Which set of targets to filter by, either all Tier-1 targets or only the current target."
    )
      .choices(TARGET_MODES)
      .default("all")
  )
  .option(
    "-d, --force-date",
    "Use date-stamped toolchains like stable-2019-04-25 instead of version numbers for stable releases.",
    false
  )
  .option("-v, --verbose", "Report each examined date on stderr.", false)
  .action(async (opts) => {
    await runResolveCommand(parseResolveOptions(opts));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(formatErrorChain(error));
  process.exitCode = 1;
});
