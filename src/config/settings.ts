import os from "os";
import path from "path";
import { z } from "zod";

const booleanFlag = z
  .preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["", "true", "false", "1", "0", "yes", "no"]).optional()
  )
  .transform((value) => value === "true" || value === "1" || value === "yes");

const SettingsSchema = z.object({
  DIAG_COLLECT_OUTPUT_PATH: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined)),
  DIAG_COLLECT_ARCHIVE: booleanFlag,
  DIAG_COLLECT_QUIET: booleanFlag
});

export interface Settings {
  outputPath?: string;
  archive: boolean;
  quiet: boolean;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.parse(env);
  return {
    outputPath: parsed.DIAG_COLLECT_OUTPUT_PATH,
    archive: parsed.DIAG_COLLECT_ARCHIVE,
    quiet: parsed.DIAG_COLLECT_QUIET
  };
}

export interface BasePathOptions {
  outputPath?: string;
  useTemp?: boolean;
}

export interface PlatformDirs {
  home: string;
  temp: string;
}

export function platformDirs(): PlatformDirs {
  return { home: os.homedir(), temp: os.tmpdir() };
}

/** `--output-path`, then `--use-temp`, then the configured default, then `~/Documents`. */
export function resolveBasePath(
  options: BasePathOptions,
  settings: Settings,
  dirs: PlatformDirs = platformDirs()
): string {
  if (options.outputPath) return path.resolve(options.outputPath);
  if (options.useTemp) return dirs.temp;
  if (settings.outputPath) return path.resolve(settings.outputPath);
  return path.join(dirs.home, "Documents");
}
