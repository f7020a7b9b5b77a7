import { runProcess } from "./process";
import { EventLogExporter, ToolExitResult } from "./types";

/** `wevtutil`-backed channel export (.evtx). */
export class WevtutilExporter implements EventLogExporter {
  async channelExists(channel: string): Promise<boolean> {
    const result = await runProcess("wevtutil.exe", ["gl", channel]);
    return result.exitCode === 0;
  }

  async exportChannel(channel: string, outputPath: string): Promise<ToolExitResult> {
    const result = await runProcess("wevtutil.exe", ["epl", channel, outputPath, "/ow:true"]);
    return { exitCode: result.exitCode };
  }
}
