import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { runArchiveStep } from "../src/collect/archiveStep";
import { ZipCompressor } from "../src/tools/archive";
import { stepLines } from "./helpers/fakeTools";
import { makeRun } from "./helpers/run";

describe("archive step", () => {
  it("zips the output directory beside it", async () => {
    const run = await makeRun();
    await fs.writeFile(path.join(run.logRoot, "System.evtx"), randomBytes(4096));

    const outcome = await runArchiveStep(run, new ZipCompressor());

    const archivePath = `${run.logRoot}.zip`;
    expect(outcome).toMatchObject({ status: "Success", outputPath: archivePath });
    expect(path.dirname(archivePath)).toBe(path.dirname(run.logRoot));
    const header = (await fs.readFile(archivePath)).subarray(0, 2).toString("latin1");
    expect(header).toBe("PK");
    expect(stepLines(run.log.lines())).toEqual([`STEP: ZIP archive succeeded; output='${archivePath}'`]);
  });

  it("overwrites a previous archive without leaving a partial file", async () => {
    const run = await makeRun();
    await fs.writeFile(path.join(run.logRoot, "System.evtx"), randomBytes(4096));
    const archivePath = `${run.logRoot}.zip`;

    await runArchiveStep(run, new ZipCompressor());
    const firstSize = (await fs.stat(archivePath)).size;
    await runArchiveStep(run, new ZipCompressor());
    const secondSize = (await fs.stat(archivePath)).size;

    expect(run.steps.map((step) => step.status)).toEqual(["Success", "Success"]);
    expect(firstSize).toBeGreaterThan(4096);
    expect(Math.abs(secondSize - firstSize)).toBeLessThan(1024);
    const siblings = await fs.readdir(path.dirname(run.logRoot));
    expect(siblings.filter((name) => name.endsWith(".partial"))).toEqual([]);
  });

  it("cleans up and reports a compressor failure", async () => {
    const run = await makeRun();
    const archivePath = `${run.logRoot}.zip`;

    const outcome = await runArchiveStep(run, {
      compress: async (_sourceDir, destPath) => {
        await fs.writeFile(destPath, "half");
        throw new Error("disk full");
      }
    });

    expect(outcome).toMatchObject({ status: "Failed", reason: "exception", error: "disk full" });
    await expect(fs.stat(`${archivePath}.partial`)).rejects.toThrow();
    expect(stepLines(run.log.lines())).toEqual([
      `STEP: ZIP archive failed; reason='exception'; file='${archivePath}'; error='disk full'`
    ]);
  });

  it("does not leave the previous archive behind when re-archiving fails", async () => {
    const run = await makeRun();
    await fs.writeFile(path.join(run.logRoot, "System.evtx"), randomBytes(4096));
    const archivePath = `${run.logRoot}.zip`;

    await runArchiveStep(run, new ZipCompressor());
    expect((await fs.stat(archivePath)).size).toBeGreaterThan(0);
    const outcome = await runArchiveStep(run, {
      compress: async () => {
        throw new Error("disk full");
      }
    });

    expect(outcome).toMatchObject({ status: "Failed", reason: "exception" });
    const siblings = await fs.readdir(path.dirname(run.logRoot));
    expect(siblings.filter((name) => name.endsWith(".zip") || name.endsWith(".partial"))).toEqual([]);
  });

  it("rejects when the archive cannot be written and leaves nothing behind", async () => {
    const run = await makeRun();
    const missingDir = path.join(path.dirname(run.logRoot), "missing");

    await expect(new ZipCompressor().compress(run.logRoot, path.join(missingDir, "out.zip"))).rejects.toThrow(
      /ENOENT/
    );
    await expect(fs.stat(missingDir)).rejects.toThrow();
  });

  it("rejects an archive below the export threshold", async () => {
    const run = await makeRun();
    const archivePath = `${run.logRoot}.zip`;

    await runArchiveStep(run, {
      compress: async (_sourceDir, destPath) => {
        await fs.writeFile(destPath, "tiny");
      }
    });

    expect(stepLines(run.log.lines())).toEqual([
      `STEP: ZIP archive failed; reason='empty or missing file'; file='${archivePath}'`
    ]);
  });
});
