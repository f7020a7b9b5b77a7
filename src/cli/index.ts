#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runCollect } from "../commands/collect";
import { describeFamilies } from "../commands/families";
import { runValidate } from "../commands/validate";
import { PreconditionFailure } from "../collect/errors";

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
  return process.env.DIAG_COLLECT_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

interface CollectCliOptions {
  outputPath?: string;
  useTemp?: boolean;
  zip?: boolean;
  archive?: boolean;
  mdm?: boolean;
  quiet?: boolean;
  skipPrivilegeCheck?: boolean;
}

interface ValidateCliOptions {
  run: string;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("diag-collect")
  .description("Collect diagnostic artifacts into a timestamped directory with a STEP activity log")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides DIAG_COLLECT_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("collect")
  .argument("<family>", "Artifact family to collect (see `families`)")
  .option("--output-path <dir>", "Base directory for the run")
  .option("--use-temp", "Use the platform temp directory as the base")
  .option("--zip", "Package the output directory into a zip beside it")
  .option("--archive", "Alias for --zip")
  .option("--mdm", "Generate the MDM diagnostics report and extract the family's policies")
  .option("--quiet", "Do not mirror the activity log to the console")
  .option("--skip-privilege-check", "Run without checking for administrator rights")
  .action(async (family: string, opts: CollectCliOptions) => {
    const archive = opts.zip || opts.archive ? true : undefined;
    await runCollect({
      family,
      outputPath: opts.outputPath,
      useTemp: Boolean(opts.useTemp),
      archive,
      mdm: Boolean(opts.mdm),
      quiet: opts.quiet ? true : undefined,
      skipPrivilegeCheck: Boolean(opts.skipPrivilegeCheck)
    });
  });

program
  .command("validate")
  .requiredOption("--run <path>", "Run directory to re-check")
  .action(async (opts: ValidateCliOptions) => {
    const report = await runValidate({ runDir: opts.run });
    for (const problem of report.problems) {
      console.error(problem);
    }
    if (report.problems.length > 0) {
      process.exitCode = 1;
      return;
    }
    console.log(`Verified ${report.checked} artifacts in ${path.resolve(opts.run)}`);
  });

program
  .command("families")
  .description("List artifact families and their steps")
  .action(() => {
    console.log(describeFamilies());
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = error instanceof PreconditionFailure ? error.exitCode : 1;
});
