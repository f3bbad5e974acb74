/**
 * RotationHistoryRepository
 *
 * Audit trail of recent rotation passes, kept in memory and bounded.
 * Newest entries are returned first.
 */

export type RotationPassStatus = 'success' | 'partial' | 'failed';

export interface RotationPassResult {
  passId: string;
  directory: string;
  status: RotationPassStatus;
  filesScanned: number;
  rolledOver: number;
  archivesCreated: number;
  filesPruned: number;
  errors: string[];
  startedAt: Date;
  completedAt: Date;
}

export const DEFAULT_HISTORY_CAPACITY = 100;

export class RotationHistoryRepository {
  private entries: RotationPassResult[] = [];

  constructor(private capacity: number = DEFAULT_HISTORY_CAPACITY) {}

  record(pass: RotationPassResult): void {
    this.entries.push(pass);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  findRecent(limit: number = this.capacity): RotationPassResult[] {
    if (limit <= 0) {
      return [];
    }
    return this.entries.slice(-limit).reverse();
  }

  findLastForDirectory(directory: string): RotationPassResult | null {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].directory === directory) {
        return this.entries[i];
      }
    }
    return null;
  }
}
