/**
 * Git LFS transfer progress
 *
 * git-lfs writes one line per update to the file named by GIT_LFS_PROGRESS:
 *
 *   <direction> <current>/<estimated> <transferred>/<size> <name>
 *
 * e.g. `download 1/3 1024/4096 assets/logo.png`.
 */

import type { GitParsingResult } from './types.js';

const LFS_PROGRESS_LINE_RE = /^(.+?)\s{1}(\d+)\/(\d+)\s{1}(\d+)\/(\d+)\s{1}(.+)$/;

interface FileProgress {
  transferred: number;
  size: number;
  done: boolean;
}

function directionToHumanFacingVerb(direction: string): string {
  switch (direction) {
    case 'download':
      return 'Downloading';
    case 'upload':
      return 'Uploading';
    case 'checkout':
      return 'Checking out';
    default:
      return 'Downloading';
  }
}

/**
 * Aggregates per-file LFS transfer lines into overall progress
 */
export class LfsProgressParser {
  private readonly files = new Map<string, FileProgress>();

  parse(line: string): GitParsingResult {
    const match = LFS_PROGRESS_LINE_RE.exec(line);
    if (match === null) {
      return { kind: 'context', percent: 0, text: line };
    }

    const [, direction = '', , estimated = '0', transferred = '0', size = '0', fileName = ''] = match;
    const fileTransferred = parseInt(transferred, 10);
    const fileSize = parseInt(size, 10);
    this.files.set(fileName, {
      transferred: fileTransferred,
      size: fileSize,
      done: fileTransferred === fileSize,
    });

    let totalTransferred = 0;
    let totalSize = 0;
    let finishedFiles = 0;
    for (const file of this.files.values()) {
      totalTransferred += file.transferred;
      totalSize += file.size;
      if (file.done) finishedFiles++;
    }

    const fileCount = Math.max(parseInt(estimated, 10), this.files.size);
    const verb = directionToHumanFacingVerb(direction);
    const percent = totalSize > 0 ? Math.floor((totalTransferred / totalSize) * 100) : 0;

    return {
      kind: 'progress',
      percent,
      details: {
        title: `${verb} "${fileName}"`,
        value: totalTransferred,
        total: totalSize,
        percent,
        done: finishedFiles === fileCount,
        text: `${verb} ${fileName} (${finishedFiles} out of an estimated ${fileCount} completed, ${totalTransferred} / ${totalSize})`,
      },
    };
  }
}
