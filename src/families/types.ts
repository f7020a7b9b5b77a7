import { QueryCommand } from "../tools/types";

export interface FileQueryStep {
  kind: "FileQuery";
  name: string;
  fileName: string;
  command: QueryCommand;
}

export interface ChannelExportStep {
  kind: "ChannelExport";
  name: string;
  fileName: string;
  /** Equivalent channels in the order they are tried. */
  channels: string[];
}

export interface RegistryExportStep {
  kind: "RegistryExport";
  name: string;
  fileName: string;
  key: string;
}

export type FamilyStep = FileQueryStep | ChannelExportStep | RegistryExportStep;

export interface MdmPolicyArea {
  area: string;
  nodeTag: string;
  selectorField: string;
  rootTag: string;
}

export interface ArtifactFamily {
  id: string;
  displayName: string;
  steps: FamilyStep[];
  mdm?: MdmPolicyArea;
}
