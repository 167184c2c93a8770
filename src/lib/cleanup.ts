import { rm } from 'fs/promises';
import { logger } from '../ui/logger.js';

/**
 * Paths created by one unit of work, removed together if the unit fails
 */
export class CleanupList {
  private readonly paths: string[] = [];

  add(path: string): void {
    this.paths.push(path);
  }

  /**
   * Forget tracked paths once the unit has committed
   */
  release(): void {
    this.paths.length = 0;
  }

  /**
   * Remove every tracked path, newest first. Failures are logged, not thrown.
   */
  async rollback(): Promise<string[]> {
    const failed: string[] = [];
    for (const path of [...this.paths].reverse()) {
      try {
        await rm(path, { force: true });
      } catch (error) {
        failed.push(path);
        logger.warning(`Could not remove ${path} during rollback: ${String(error)}`);
      }
    }
    this.paths.length = 0;
    return failed;
  }

  /**
   * Run fn and roll back if it throws
   */
  async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      await this.rollback();
      throw error;
    }
  }
}
