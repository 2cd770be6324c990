/**
 * Planner backed by a plan document on disk (`--plan <file>`).
 * Every call re-reads the file, so edits between iterations are picked up.
 */

import type { FileSystem } from '../types/file-system';
import type { Planner, PlanRequest } from '../types/collaborators';

export class FilePlanner implements Planner {
  readonly name = 'file';

  constructor(
    private readonly fs: FileSystem,
    private readonly path: string
  ) {}

  async plan(_request: PlanRequest): Promise<unknown> {
    const read = await this.fs.readFile(this.path);
    if (!read.ok) {
      throw new Error(`Cannot read plan file ${this.path}: ${read.error.message}`);
    }
    try {
      const document: unknown = JSON.parse(read.value);
      return document;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Plan file ${this.path} is not valid JSON: ${message}`, { cause: error });
    }
  }
}
