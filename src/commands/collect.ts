import { createCollectionRun, executeCollection, CollectionSummary } from "../collect/collectionRun";
import { InsufficientPrivilegeError } from "../collect/errors";
import { loadSettings, PlatformDirs, platformDirs, resolveBasePath, Settings } from "../config/settings";
import { FAMILIES, getFamilyById } from "../families";
import { windowsTools } from "../tools";
import { ProcessPrivilegeCheck } from "../tools/privilege";
import { CollectionTools, PrivilegeCheck } from "../tools/types";

export interface CollectOptions {
  family: string;
  outputPath?: string;
  useTemp?: boolean;
  archive?: boolean;
  mdm?: boolean;
  quiet?: boolean;
  skipPrivilegeCheck?: boolean;
}

export interface CollectDependencies {
  tools: CollectionTools;
  privilege: PrivilegeCheck;
  settings: Settings;
  dirs: PlatformDirs;
  now: () => Date;
}

function defaultDependencies(): CollectDependencies {
  return {
    tools: windowsTools(),
    privilege: new ProcessPrivilegeCheck(),
    settings: loadSettings(),
    dirs: platformDirs(),
    now: () => new Date()
  };
}

export async function runCollect(
  options: CollectOptions,
  deps: CollectDependencies = defaultDependencies()
): Promise<CollectionSummary> {
  const family = getFamilyById(options.family);
  if (!family) {
    const known = FAMILIES.map((entry) => entry.id).join(", ");
    throw new Error(`Unknown artifact family '${options.family}' (expected one of: ${known})`);
  }
  if (options.mdm && !family.mdm) {
    throw new Error(`--mdm is not available for ${family.displayName} collection`);
  }

  if (!options.skipPrivilegeCheck && !(await deps.privilege.isElevated())) {
    throw new InsufficientPrivilegeError();
  }

  const basePath = resolveBasePath(options, deps.settings, deps.dirs);
  const run = await createCollectionRun({
    family,
    basePath,
    now: deps.now(),
    mirrorToConsole: !(options.quiet ?? deps.settings.quiet)
  });

  return executeCollection(run, family, deps.tools, {
    archive: options.archive ?? deps.settings.archive,
    mdm: options.mdm ?? false
  });
}
