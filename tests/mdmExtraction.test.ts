import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { runMdmExtraction } from "../src/collect/mdmExtraction";
import { bitlockerFamily } from "../src/families/bitlocker";
import { MdmPolicyArea } from "../src/families/types";
import { FakeReportGenerator, readFixture, stepLines } from "./helpers/fakeTools";
import { makeRun } from "./helpers/run";

function bitlockerArea(): MdmPolicyArea {
  if (!bitlockerFamily.mdm) throw new Error("BitLocker family has no MDM area");
  return bitlockerFamily.mdm;
}

describe("MDM extraction", () => {
  it("writes the matching policy areas and reports the count", async () => {
    const run = await makeRun();
    const generator = new FakeReportGenerator(await readFixture("MDMDiagReport.xml"));

    const outcome = await runMdmExtraction(run, bitlockerArea(), generator);

    const outputPath = path.join(run.logRoot, "MDM_BitLocker_Policies.xml");
    expect(outcome).toMatchObject({ status: "Success", count: 2, outputPath });
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: MDM XML parsing succeeded; output='${outputPath}'; count=2`
    ]);
    const written = await fs.readFile(outputPath, "utf8");
    expect(written).toContain("<RequireDeviceEncryption>1</RequireDeviceEncryption>");
    expect(written).not.toContain("DeferFeatureUpdatesPeriodInDays");
  });

  it("reports a missing report as source document not found", async () => {
    const run = await makeRun();

    await runMdmExtraction(run, bitlockerArea(), new FakeReportGenerator(null, 1));

    const reportPath = path.join(run.logRoot, "MDMDiag", "MDMDiagReport.xml");
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: MDM XML parsing failed; reason='source document not found'; file='${reportPath}'`
    ]);
    expect(run.log.lines().some((line) => line.endsWith("[WARN] MDM diagnostics report generator exited with 1"))).toBe(true);
  });

  it("reports an unreadable report as a parse exception", async () => {
    const run = await makeRun();

    await runMdmExtraction(run, bitlockerArea(), new FakeReportGenerator("   "));

    const reportPath = path.join(run.logRoot, "MDMDiag", "MDMDiagReport.xml");
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: MDM XML parsing failed; reason='parse exception'; file='${reportPath}'; error='Report document is empty'`
    ]);
  });

  it("reports zero matches as no matching nodes and still writes the empty document", async () => {
    const run = await makeRun();
    const xml = (await readFixture("MDMDiagReport.xml")).replace(/bitlocker/gi, "Defender");

    const outcome = await runMdmExtraction(run, bitlockerArea(), new FakeReportGenerator(xml));

    const outputPath = path.join(run.logRoot, "MDM_BitLocker_Policies.xml");
    expect(outcome).toMatchObject({ status: "Failed", reason: "no matching nodes" });
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: MDM XML parsing failed; reason='no matching nodes'; file='${outputPath}'`
    ]);
    expect(await fs.readFile(outputPath, "utf8")).toContain("BitLockerPolicies");
  });

  it("reports a throwing generator as an exception", async () => {
    const run = await makeRun();

    await runMdmExtraction(run, bitlockerArea(), {
      generate: async () => {
        throw new Error("tool not installed");
      }
    });

    const outputPath = path.join(run.logRoot, "MDM_BitLocker_Policies.xml");
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: MDM XML parsing failed; reason='exception'; file='${outputPath}'; error='tool not installed'`
    ]);
  });
});
