import { bitlockerFamily } from "./bitlocker";
import { defenderFamily } from "./defender";
import { ArtifactFamily } from "./types";

export const FAMILIES: readonly ArtifactFamily[] = [bitlockerFamily, defenderFamily];

export function getFamilyById(id: string): ArtifactFamily | undefined {
  const lower = id.toLowerCase();
  return FAMILIES.find((family) => family.id === lower);
}
