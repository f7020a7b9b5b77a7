import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ZipCompressor } from "../../src/tools/archive";
import { MDM_REPORT_FILENAME } from "../../src/tools/mdmReport";
import {
  CollectionTools,
  CommandQuery,
  EventLogExporter,
  QueryCommand,
  QueryResult,
  RegistryExporter,
  ReportGenerator,
  ToolExitResult
} from "../../src/tools/types";

export const fixturesDir = path.join(process.cwd(), "fixtures");

export async function makeTempDir(prefix = "diag-collect-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Channels map to the number of (incompressible) bytes their export writes. */
export class FakeEventLog implements EventLogExporter {
  readonly probed: string[] = [];
  readonly exported: string[] = [];

  constructor(private readonly channels: Map<string, number> = new Map()) {}

  async channelExists(channel: string): Promise<boolean> {
    this.probed.push(channel);
    return this.channels.has(channel);
  }

  async exportChannel(channel: string, outputPath: string): Promise<ToolExitResult> {
    this.exported.push(channel);
    await fs.writeFile(outputPath, randomBytes(this.channels.get(channel) ?? 0));
    return { exitCode: 0 };
  }
}

export class FakeRegistry implements RegistryExporter {
  constructor(private readonly keys: Map<string, string> = new Map()) {}

  async keyExists(key: string): Promise<boolean> {
    return this.keys.has(key);
  }

  async exportKey(key: string, outputPath: string): Promise<ToolExitResult> {
    await fs.writeFile(outputPath, this.keys.get(key) ?? "", "utf8");
    return { exitCode: 0 };
  }
}

export class FakeQuery implements CommandQuery {
  constructor(private readonly results: Map<string, QueryResult | Error> = new Map()) {}

  async run(command: QueryCommand): Promise<QueryResult> {
    const result = this.results.get(command.file);
    if (result instanceof Error) throw result;
    return result ?? { exitCode: null, stdout: "" };
  }
}

/** Writes `content` as the report, or nothing at all when `content` is null. */
export class FakeReportGenerator implements ReportGenerator {
  constructor(
    private readonly content: string | null,
    private readonly exitCode: number | null = 0
  ) {}

  async generate(outputDir: string): Promise<ToolExitResult> {
    await fs.mkdir(outputDir, { recursive: true });
    if (this.content !== null) {
      await fs.writeFile(path.join(outputDir, MDM_REPORT_FILENAME), this.content, "utf8");
    }
    return { exitCode: this.exitCode };
  }
}

export async function readFixture(name: string): Promise<string> {
  return fs.readFile(path.join(fixturesDir, name), "utf8");
}

export function fakeTools(overrides: Partial<CollectionTools> = {}): CollectionTools {
  return {
    eventLog: new FakeEventLog(),
    registry: new FakeRegistry(),
    query: new FakeQuery(),
    report: new FakeReportGenerator(null),
    archive: new ZipCompressor(),
    ...overrides
  };
}

export function stepLines(lines: readonly string[]): string[] {
  return lines.filter((line) => line.includes("STEP:")).map((line) => line.slice(line.indexOf("STEP:")));
}
