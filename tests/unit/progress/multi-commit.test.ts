import { describe, it, expect } from 'vitest';
import {
  CherryPickProgressParser,
  RebaseProgressParser,
  formatRebaseValue,
} from '../../../src/progress/multi-commit.js';

const commits = [{ summary: 'First' }, { summary: 'Second' }, { summary: 'Third' }];

describe('formatRebaseValue', () => {
  it('should clamp and round to two decimals', () => {
    expect(formatRebaseValue(-0.5)).toBe(0);
    expect(formatRebaseValue(0.125)).toBe(0.13);
    expect(formatRebaseValue(2 / 3)).toBe(0.67);
    expect(formatRebaseValue(1.5)).toBe(1);
  });
});

describe('RebaseProgressParser', () => {
  it('should report the commit being applied', () => {
    const parser = new RebaseProgressParser(commits);

    expect(parser.parse('Rebasing (2/3)')).toEqual({
      kind: 'multiCommitOperation',
      currentCommitSummary: 'Second',
      position: 2,
      totalCommitCount: 3,
      value: 0.67,
    });
  });

  it('should use an empty summary when the position is out of range', () => {
    const parser = new RebaseProgressParser(commits);

    expect(parser.parse('Rebasing (5/3)')).toMatchObject({ currentCommitSummary: '', value: 1 });
    expect(parser.parse('Rebasing (0/3)')).toMatchObject({ currentCommitSummary: '', value: 0 });
  });

  it('should ignore other lines', () => {
    const parser = new RebaseProgressParser(commits);
    expect(parser.parse('Successfully rebased and updated refs/heads/main.')).toBeNull();
  });
});

describe('CherryPickProgressParser', () => {
  it('should count picked commits', () => {
    const parser = new CherryPickProgressParser(commits);

    expect(parser.parse('[main 1a2b3c4] Add feature')).toEqual({
      kind: 'multiCommitOperation',
      currentCommitSummary: 'First',
      position: 1,
      totalCommitCount: 3,
      value: 0.33,
    });
    expect(parser.parse('Auto-merging src/app.ts')).toBeNull();
    expect(parser.parse('[main 5d6e7f8] Fix typo')).toMatchObject({
      currentCommitSummary: 'Second',
      position: 2,
      value: 0.67,
    });
  });

  it('should resume from an earlier count', () => {
    const parser = new CherryPickProgressParser(commits, 2);
    expect(parser.parse('[main 1a2b3c4] Last one')).toMatchObject({
      currentCommitSummary: 'Third',
      position: 3,
      value: 1,
    });
  });

  it('should report zero for an empty commit list', () => {
    const parser = new CherryPickProgressParser([]);
    expect(parser.parse('[main 1a2b3c4] Orphan')).toEqual({
      kind: 'multiCommitOperation',
      currentCommitSummary: '',
      position: 1,
      totalCommitCount: 0,
      value: 0,
    });
  });

  it('should require a space inside the brackets', () => {
    const parser = new CherryPickProgressParser(commits);
    expect(parser.parse('[main]')).toBeNull();
  });
});
