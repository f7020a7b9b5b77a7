import { powershell } from "../tools/process";
import { ArtifactFamily } from "./types";

export const defenderFamily: ArtifactFamily = {
  id: "defender",
  displayName: "Defender",
  steps: [
    {
      kind: "FileQuery",
      name: "Defender status",
      fileName: "Get-MpComputerStatus.txt",
      command: powershell("Get-MpComputerStatus | Format-List * | Out-String -Width 4096")
    },
    {
      kind: "FileQuery",
      name: "Defender preferences",
      fileName: "Get-MpPreference.txt",
      command: powershell("Get-MpPreference | Format-List * | Out-String -Width 4096")
    },
    {
      kind: "ChannelExport",
      name: "Defender operational events",
      fileName: "Defender-Operational.evtx",
      channels: [
        "Microsoft-Windows-Windows Defender/Operational",
        "Microsoft-Windows-Defender/Operational"
      ]
    },
    {
      kind: "ChannelExport",
      name: "Defender WHC events",
      fileName: "Defender-WHC.evtx",
      channels: ["Microsoft-Windows-Windows Defender/WHC"]
    },
    {
      kind: "RegistryExport",
      name: "Defender policy registry",
      fileName: "Defender_Policies.reg",
      key: "HKLM\\SOFTWARE\\Policies\\Microsoft\\Windows Defender"
    }
  ]
};
