import { runProcess } from "./process";
import { CommandQuery, QueryCommand, QueryResult } from "./types";

export class ProcessCommandQuery implements CommandQuery {
  async run(command: QueryCommand): Promise<QueryResult> {
    const result = await runProcess(command.file, command.args);
    return { exitCode: result.exitCode, stdout: result.stdout };
  }
}
