import { runProcess } from "./process";
import { RegistryExporter, ToolExitResult } from "./types";

export class RegExeExporter implements RegistryExporter {
  async keyExists(key: string): Promise<boolean> {
    const result = await runProcess("reg.exe", ["query", key]);
    return result.exitCode === 0;
  }

  async exportKey(key: string, outputPath: string): Promise<ToolExitResult> {
    const result = await runProcess("reg.exe", ["export", key, outputPath, "/y"]);
    return { exitCode: result.exitCode };
  }
}
