import { resolveAndExport } from "./channelFallback";
import { runStep, StepDefinition } from "./stepRunner";
import { stepOutputPath } from "../io/paths";
import { writeText } from "../utils/fs";
import { ChannelExportStep, FamilyStep, FileQueryStep, RegistryExportStep } from "../families/types";
import { CollectionTools } from "../tools/types";
import { CollectionRun } from "../types/collectionRun";
import { StepOutcome } from "../types/stepOutcome";

function fileQueryStep(run: CollectionRun, step: FileQueryStep, tools: CollectionTools): StepDefinition {
  const outputPath = stepOutputPath(run.logRoot, step.fileName);
  return {
    name: step.name,
    kind: "FileQuery",
    outputPath,
    channel: step.command.file,
    action: async () => {
      const result = await tools.query.run(step.command);
      if (result.exitCode !== null) {
        await writeText(outputPath, result.stdout);
      }
      return { exitCode: result.exitCode };
    }
  };
}

function registryStep(run: CollectionRun, step: RegistryExportStep, tools: CollectionTools): StepDefinition {
  const outputPath = stepOutputPath(run.logRoot, step.fileName);
  return {
    name: step.name,
    kind: "RegistryExport",
    outputPath,
    channel: step.key,
    action: async () => {
      if (!(await tools.registry.keyExists(step.key))) {
        return { skipped: true };
      }
      return tools.registry.exportKey(step.key, outputPath);
    }
  };
}

function singleChannelStep(
  run: CollectionRun,
  step: ChannelExportStep,
  channel: string,
  tools: CollectionTools
): StepDefinition {
  const outputPath = stepOutputPath(run.logRoot, step.fileName);
  return {
    name: step.name,
    kind: "ChannelExport",
    outputPath,
    channel,
    action: async () => {
      if (!(await tools.eventLog.channelExists(channel))) {
        return { skipped: true };
      }
      return tools.eventLog.exportChannel(channel, outputPath);
    }
  };
}

/** Runs one declared family step; channel exports with alternates go through the fallback resolver. */
export async function executeFamilyStep(
  run: CollectionRun,
  step: FamilyStep,
  tools: CollectionTools
): Promise<StepOutcome> {
  switch (step.kind) {
    case "FileQuery":
      return runStep(run, fileQueryStep(run, step, tools));
    case "RegistryExport":
      return runStep(run, registryStep(run, step, tools));
    case "ChannelExport": {
      const [only, ...alternates] = step.channels;
      if (only !== undefined && alternates.length === 0) {
        return runStep(run, singleChannelStep(run, step, only, tools));
      }
      return resolveAndExport(run, {
        name: step.name,
        candidates: step.channels,
        outputPath: stepOutputPath(run.logRoot, step.fileName),
        probe: (candidate) => tools.eventLog.channelExists(candidate),
        exportFn: (candidate, outputPath) => tools.eventLog.exportChannel(candidate, outputPath)
      });
    }
  }
}
