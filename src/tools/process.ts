import execa from "execa";

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** Runs a tool to completion; a tool that cannot be spawned resolves with `exitCode: null`. */
export async function runProcess(file: string, args: string[]): Promise<ProcessResult> {
  const result = await execa(file, args, { reject: false, windowsHide: true });
  return {
    exitCode: typeof result.exitCode === "number" ? result.exitCode : null,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? ""
  };
}

export function powershell(script: string): { file: string; args: string[] } {
  return {
    file: "powershell.exe",
    args: ["-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-Command", script]
  };
}
