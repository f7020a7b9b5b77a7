export interface ToolExitResult {
  /** `null` when the tool could not be started or was killed before exiting. */
  exitCode: number | null;
}

export interface QueryCommand {
  file: string;
  args: string[];
}

export interface QueryResult extends ToolExitResult {
  stdout: string;
}

export interface PrivilegeCheck {
  isElevated(): Promise<boolean>;
}

export interface EventLogExporter {
  channelExists(channel: string): Promise<boolean>;
  exportChannel(channel: string, outputPath: string): Promise<ToolExitResult>;
}

export interface RegistryExporter {
  keyExists(key: string): Promise<boolean>;
  exportKey(key: string, outputPath: string): Promise<ToolExitResult>;
}

export interface CommandQuery {
  run(command: QueryCommand): Promise<QueryResult>;
}

export interface ReportGenerator {
  /** Writes the diagnostic report files into `outputDir`. */
  generate(outputDir: string): Promise<ToolExitResult>;
}

export interface ArchiveCompressor {
  compress(sourceDir: string, destPath: string): Promise<void>;
}

export interface CollectionTools {
  eventLog: EventLogExporter;
  registry: RegistryExporter;
  query: CommandQuery;
  report: ReportGenerator;
  archive: ArchiveCompressor;
}
