import { runProcess } from "./process";
import { ensureDir } from "../utils/fs";
import { ReportGenerator, ToolExitResult } from "./types";

export const MDM_REPORT_FILENAME = "MDMDiagReport.xml";

export class MdmDiagnosticsGenerator implements ReportGenerator {
  async generate(outputDir: string): Promise<ToolExitResult> {
    await ensureDir(outputDir);
    const result = await runProcess("MdmDiagnosticsTool.exe", ["-out", outputDir]);
    return { exitCode: result.exitCode };
  }
}
