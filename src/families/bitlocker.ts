import { powershell } from "../tools/process";
import { ArtifactFamily } from "./types";

const formatted = (cmdlet: string) => powershell(`${cmdlet} | Format-List * | Out-String -Width 4096`);

export const bitlockerFamily: ArtifactFamily = {
  id: "bitlocker",
  displayName: "BitLocker",
  steps: [
    {
      kind: "FileQuery",
      name: "manage-bde status",
      fileName: "manage-bde_status.txt",
      command: { file: "manage-bde.exe", args: ["-status"] }
    },
    {
      kind: "FileQuery",
      name: "BitLocker volumes",
      fileName: "Get-BitLockerVolume.txt",
      command: formatted("Get-BitLockerVolume")
    },
    {
      kind: "FileQuery",
      name: "TPM state",
      fileName: "Get-Tpm.txt",
      command: formatted("Get-Tpm")
    },
    {
      kind: "ChannelExport",
      name: "BitLocker management events",
      fileName: "BitLocker-Management.evtx",
      channels: [
        "Microsoft-Windows-BitLocker/BitLocker Management",
        "Microsoft-Windows-BitLocker-API/Management"
      ]
    },
    {
      kind: "ChannelExport",
      name: "BitLocker operational events",
      fileName: "BitLocker-Operational.evtx",
      channels: ["Microsoft-Windows-BitLocker/BitLocker Operational"]
    },
    {
      kind: "ChannelExport",
      name: "BitLocker drive preparation events",
      fileName: "BitLocker-DrivePreparationTool.evtx",
      channels: [
        "Microsoft-Windows-BitLocker-DrivePreparationTool/Operational",
        "Microsoft-Windows-BitLocker-DrivePreparationTool/Admin"
      ]
    },
    {
      kind: "ChannelExport",
      name: "TPM events",
      fileName: "TPM.evtx",
      channels: ["Microsoft-Windows-TPM-WMI/Operational", "Microsoft-Windows-TPM-WMI"]
    },
    {
      kind: "ChannelExport",
      name: "System events",
      fileName: "System.evtx",
      channels: ["System"]
    },
    {
      kind: "RegistryExport",
      name: "FVE policy registry",
      fileName: "FVE_Policies.reg",
      key: "HKLM\\SOFTWARE\\Policies\\Microsoft\\FVE"
    },
    {
      kind: "RegistryExport",
      name: "BitLocker state registry",
      fileName: "BitLocker_State.reg",
      key: "HKLM\\SYSTEM\\CurrentControlSet\\Control\\BitLockerStatus"
    }
  ],
  mdm: {
    area: "BitLocker",
    nodeTag: "Area",
    selectorField: "PolicyAreaName",
    rootTag: "BitLockerPolicies"
  }
};
