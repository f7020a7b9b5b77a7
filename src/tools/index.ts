import { ZipCompressor } from "./archive";
import { ProcessCommandQuery } from "./commandQuery";
import { WevtutilExporter } from "./eventLog";
import { MdmDiagnosticsGenerator } from "./mdmReport";
import { RegExeExporter } from "./registry";
import { CollectionTools } from "./types";

export function windowsTools(): CollectionTools {
  return {
    eventLog: new WevtutilExporter(),
    registry: new RegExeExporter(),
    query: new ProcessCommandQuery(),
    report: new MdmDiagnosticsGenerator(),
    archive: new ZipCompressor()
  };
}
