/**
 * One progress-reporting session over a git command's stderr, optionally
 * interleaved with Git LFS transfer lines
 */

import { parseProgressLine, type GitProgressParser } from './git-progress.js';
import type { LfsProgressParser } from './lfs.js';
import type { GitParsingResult } from './types.js';

const FILTERING_CONTENT_TITLE = 'Filtering content';

export interface ProgressSessionOptions {
  /** Parser for lines read from the GIT_LFS_PROGRESS file */
  lfsParser?: LfsProgressParser;
}

export class ProgressSession {
  private readonly lfsParser: LfsProgressParser | undefined;
  private lfsProgressActive = false;

  constructor(
    private readonly parser: GitProgressParser,
    options: ProgressSessionOptions = {}
  ) {
    this.lfsParser = options.lfsParser;
  }

  /**
   * Whether LFS transfer progress is currently being reported
   */
  get isLfsActive(): boolean {
    return this.lfsProgressActive;
  }

  /**
   * Handle a stderr line from git
   *
   * While LFS progress is active, context lines and the LFS filter's own
   * `Filtering content` progress are withheld until that filter reports done.
   *
   * @returns The event to report, or null when the line is withheld
   */
  parseGitLine(line: string): GitParsingResult | null {
    const progress = this.parser.parse(line);
    if (!this.lfsProgressActive) {
      return progress;
    }

    // Checked on the decoded line since no step table lists the filter
    const info = parseProgressLine(line);
    if (info?.title === FILTERING_CONTENT_TITLE) {
      if (info.done) {
        this.lfsProgressActive = false;
      }
      return null;
    }

    return progress.kind === 'context' ? null : progress;
  }

  /**
   * Handle a line from the LFS progress file
   *
   * @returns The progress event, or null when LFS is not tracked or the line is not progress
   */
  parseLfsLine(line: string): GitParsingResult | null {
    if (this.lfsParser === undefined) {
      return null;
    }
    const progress = this.lfsParser.parse(line);
    if (progress.kind !== 'progress') {
      return null;
    }
    this.lfsProgressActive = true;
    return progress;
  }
}
