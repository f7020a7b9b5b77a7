import { promises as fs } from "fs";
import path from "path";
import { finalizeStep } from "./stepRunner";
import { mdmPolicyPath, mdmReportDir } from "../io/paths";
import {
  equalsIgnoreCase,
  extractMatching,
  loadReport,
  ReportDocument,
  ReportParseError
} from "../report/reportFilter";
import { MDM_REPORT_FILENAME } from "../tools/mdmReport";
import { pathExists, writeText } from "../utils/fs";
import { errorMessage } from "../utils/text";
import { minSizeFor, validateArtifact } from "../validation/artifact";
import { MdmPolicyArea } from "../families/types";
import { ReportGenerator } from "../tools/types";
import { CollectionRun } from "../types/collectionRun";
import { StepOutcome } from "../types/stepOutcome";

const STEP_NAME = "MDM XML parsing";

async function extract(run: CollectionRun, area: MdmPolicyArea, generator: ReportGenerator): Promise<StepOutcome> {
  const reportDir = mdmReportDir(run.logRoot);
  const reportPath = path.join(reportDir, MDM_REPORT_FILENAME);
  const outputPath = mdmPolicyPath(run.logRoot, area.area);

  const generated = await generator.generate(reportDir);
  if (generated.exitCode !== 0) {
    const exit = generated.exitCode === null ? "n/a" : String(generated.exitCode);
    run.log.warn(`MDM diagnostics report generator exited with ${exit}`);
  }

  if (!(await pathExists(reportPath))) {
    return {
      status: "Failed",
      name: STEP_NAME,
      kind: "ReportExtraction",
      outputPath: reportPath,
      reason: "source document not found"
    };
  }

  const xml = await fs.readFile(reportPath, "utf8");
  let report: ReportDocument;
  try {
    report = loadReport(xml);
  } catch (error) {
    if (!(error instanceof ReportParseError)) throw error;
    return {
      status: "Failed",
      name: STEP_NAME,
      kind: "ReportExtraction",
      outputPath: reportPath,
      reason: "parse exception",
      error: error.message
    };
  }

  const filtered = extractMatching(report, {
    nodeTag: area.nodeTag,
    selectorField: area.selectorField,
    matches: equalsIgnoreCase(area.area),
    rootTag: area.rootTag
  });
  await writeText(outputPath, filtered.xml);

  if (filtered.count === 0) {
    return { status: "Failed", name: STEP_NAME, kind: "ReportExtraction", outputPath, reason: "no matching nodes" };
  }

  const artifact = await validateArtifact(outputPath, minSizeFor("ReportExtraction"));
  if (!artifact.exists || !artifact.sizeOK) {
    return {
      status: "Failed",
      name: STEP_NAME,
      kind: "ReportExtraction",
      outputPath,
      reason: "empty or missing file",
      exists: artifact.exists,
      sizeOK: artifact.sizeOK
    };
  }
  return { status: "Success", name: STEP_NAME, kind: "ReportExtraction", outputPath, count: filtered.count };
}

/** Generates the MDM diagnostics report and keeps only the policy nodes for one area. */
export async function runMdmExtraction(
  run: CollectionRun,
  area: MdmPolicyArea,
  generator: ReportGenerator
): Promise<StepOutcome> {
  let outcome: StepOutcome;
  try {
    outcome = await extract(run, area, generator);
  } catch (error) {
    outcome = {
      status: "Failed",
      name: STEP_NAME,
      kind: "ReportExtraction",
      outputPath: mdmPolicyPath(run.logRoot, area.area),
      reason: "exception",
      error: errorMessage(error)
    };
  }
  return finalizeStep(run, outcome);
}
