import { runProcess } from "./process";
import { PrivilegeCheck } from "./types";

export class ProcessPrivilegeCheck implements PrivilegeCheck {
  async isElevated(): Promise<boolean> {
    if (process.platform === "win32") {
      const result = await runProcess("net.exe", ["session"]);
      return result.exitCode === 0;
    }
    return typeof process.getuid === "function" && process.getuid() === 0;
  }
}
