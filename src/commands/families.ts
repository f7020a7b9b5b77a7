import { FAMILIES } from "../families";

export function describeFamilies(): string {
  const lines: string[] = [];
  for (const family of FAMILIES) {
    lines.push(`${family.id} (${family.displayName}Logs-DD-MM-YYYY-HH-MM)${family.mdm ? " [--mdm]" : ""}`);
    for (const step of family.steps) {
      const source =
        step.kind === "ChannelExport"
          ? step.channels.join(" | ")
          : step.kind === "RegistryExport"
            ? step.key
            : step.command.file;
      lines.push(`  - ${step.name} [${step.kind}] ${source} -> ${step.fileName}`);
    }
  }
  return lines.join("\n");
}
