/**
 * Result record persistence
 *
 * One JSON document per invocation, written for every terminal loop state
 * to `<artifactBaseDir>/runs/<runId>/result.json` and, when requested, to an
 * extra output file.
 */

import type { ExecutionReport } from '../types/execution';
import type { FileSystem, FileSystemError } from '../types/file-system';
import type { Logger } from '../types/logger';
import type { MemoryMatch } from '../types/collaborators';
import { Result, ok, err } from '../types/result';
import type { PlanDocument } from '../schemas/plan-document.schema';
import type { ReviewDocument } from '../schemas/review-document.schema';

export interface ResultRecordContext {
  /** Last plan, null when no plan was ever accepted */
  plan: PlanDocument | null;
  /** Every pass's report, oldest first */
  execution_history: ExecutionReport[];
  retrieved_memories: MemoryMatch[];
  iteration_count: number;
  errors_recovered: number;
}

export interface ResultRecord {
  success: boolean;
  goal: string;
  /** Report of the last execution pass */
  result: ExecutionReport | null;
  /** Last review, null when no pass was reviewed */
  review: ReviewDocument | null;
  context: ResultRecordContext;
  error?: string;
  final_state: string;
  stop_reason?: string;
  run_id: string;
  started_at: string;
  finished_at: string;
}

export const RESULT_FILE_NAME = 'result.json';

export class ResultStore {
  constructor(
    private readonly fs: FileSystem,
    private readonly artifactBaseDir: string,
    private readonly logger: Logger
  ) {}

  getRunDirectory(runId: string): string {
    return this.fs.join(this.artifactBaseDir, 'runs', runId);
  }

  getRecordPath(runId: string): string {
    return this.fs.join(this.getRunDirectory(runId), RESULT_FILE_NAME);
  }

  /**
   * Write the record to the run directory and to `outputFile` when given.
   * Returns the paths written.
   */
  async write(record: ResultRecord, outputFile?: string): Promise<Result<string[], FileSystemError>> {
    const content = JSON.stringify(record, null, 2) + '\n';
    const targets = [this.getRecordPath(record.run_id)];
    if (outputFile) {
      targets.push(this.fs.resolve(outputFile));
    }

    for (const target of targets) {
      const written = await this.fs.writeFile(target, content, { createParents: true });
      if (!written.ok) {
        this.logger.error(`Failed to write result record: ${written.error.message}`, {
          path: target,
        });
        return err(written.error);
      }
      this.logger.event('record_written', `Result record written to ${target}`, {
        path: target,
        success: record.success,
      });
    }

    return ok(targets);
  }
}
