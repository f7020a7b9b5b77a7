import path from "path";
import { describe, expect, it } from "vitest";
import { resolveAndExport } from "../src/collect/channelFallback";
import { FakeEventLog, stepLines } from "./helpers/fakeTools";
import { makeRun } from "./helpers/run";

function fallbackStep(eventLog: FakeEventLog, outputPath: string, candidates: string[]) {
  return {
    name: "Mgmt events",
    candidates,
    outputPath,
    probe: (candidate: string) => eventLog.channelExists(candidate),
    exportFn: (candidate: string, target: string) => eventLog.exportChannel(candidate, target)
  };
}

describe("resolveAndExport", () => {
  it("falls back past an unreachable channel", async () => {
    const run = await makeRun();
    const outputPath = path.join(run.logRoot, "Mgmt.evtx");
    const eventLog = new FakeEventLog(new Map([["B", 2048]]));

    const outcome = await resolveAndExport(run, fallbackStep(eventLog, outputPath, ["A", "B"]));

    expect(outcome).toMatchObject({ status: "Success", channel: "B", kind: "ChannelExport" });
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: Mgmt events export succeeded; channel='B'; output='${outputPath}'`
    ]);
    expect(run.log.lines().some((line) => line.endsWith("[WARN] Channel 'A' not found; trying next candidate"))).toBe(true);
  });

  it("stops at the first channel that yields a valid artifact", async () => {
    const run = await makeRun();
    const eventLog = new FakeEventLog(new Map([["A", 4096], ["B", 4096]]));

    await resolveAndExport(run, fallbackStep(eventLog, path.join(run.logRoot, "Mgmt.evtx"), ["A", "B"]));

    expect(eventLog.probed).toEqual(["A"]);
    expect(eventLog.exported).toEqual(["A"]);
  });

  it("moves on when a reachable channel exports too little", async () => {
    const run = await makeRun();
    const eventLog = new FakeEventLog(new Map([["A", 10], ["B", 2048]]));

    const outcome = await resolveAndExport(run, fallbackStep(eventLog, path.join(run.logRoot, "Mgmt.evtx"), ["A", "B"]));

    expect(outcome).toMatchObject({ status: "Success", channel: "B" });
    expect(eventLog.exported).toEqual(["A", "B"]);
  });

  it("fails with every attempted channel when none succeeds", async () => {
    const run = await makeRun();
    const outputPath = path.join(run.logRoot, "Mgmt.evtx");
    const eventLog = new FakeEventLog();

    const outcome = await resolveAndExport(run, fallbackStep(eventLog, outputPath, ["A", "B"]));

    expect(outcome).toMatchObject({ status: "Failed", reason: "no channel succeeded", attempted: ["A", "B"] });
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: Mgmt events export failed; reason='no channel succeeded'; attempted='A, B'; file='${outputPath}'`
    ]);
  });

  it("treats a throwing probe as unreachable", async () => {
    const run = await makeRun();
    const eventLog = new FakeEventLog(new Map([["B", 2048]]));
    const step = fallbackStep(eventLog, path.join(run.logRoot, "Mgmt.evtx"), ["A", "B"]);

    const outcome = await resolveAndExport(run, {
      ...step,
      probe: async (candidate) => {
        if (candidate === "A") throw new Error("access denied");
        return eventLog.channelExists(candidate);
      }
    });

    expect(outcome).toMatchObject({ status: "Success", channel: "B" });
  });
});
