/**
 * RotationHistoryRepository Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { RotationHistoryRepository } from '../../../src/repositories/rotation-history.repository';
import type { RotationPassResult } from '../../../src/repositories/rotation-history.repository';

function pass(passId: string, directory = '/var/log/app'): RotationPassResult {
  return {
    passId,
    directory,
    status: 'success',
    filesScanned: 1,
    rolledOver: 0,
    archivesCreated: 0,
    filesPruned: 0,
    errors: [],
    startedAt: new Date(0),
    completedAt: new Date(0),
  };
}

describe('RotationHistoryRepository', () => {
  it('should return recent passes newest first', () => {
    const history = new RotationHistoryRepository();
    history.record(pass('1'));
    history.record(pass('2'));
    history.record(pass('3'));

    expect(history.findRecent(2).map((entry) => entry.passId)).toEqual(['3', '2']);
  });

  it('should return nothing for a zero limit', () => {
    const history = new RotationHistoryRepository();
    history.record(pass('1'));

    expect(history.findRecent(0)).toEqual([]);
  });

  it('should drop the oldest passes beyond capacity', () => {
    const history = new RotationHistoryRepository(2);
    history.record(pass('1'));
    history.record(pass('2'));
    history.record(pass('3'));

    expect(history.findRecent().map((entry) => entry.passId)).toEqual(['3', '2']);
  });

  it('should find the last pass for a directory', () => {
    const history = new RotationHistoryRepository();
    history.record(pass('1', '/var/log/app'));
    history.record(pass('2', '/var/log/worker'));
    history.record(pass('3', '/var/log/app'));

    expect(history.findLastForDirectory('/var/log/app')?.passId).toBe('3');
    expect(history.findLastForDirectory('/var/log/none')).toBeNull();
  });
});
