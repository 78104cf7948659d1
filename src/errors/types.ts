/**
 * Error types for git-readout
 */

/**
 * Causes of git command failure that can be recognised from its output
 */
export enum GitErrorKind {
  SSHKeyAuditUnverified = 'SSHKeyAuditUnverified',
  SSHAuthenticationFailed = 'SSHAuthenticationFailed',
  SSHPermissionDenied = 'SSHPermissionDenied',
  HTTPSAuthenticationFailed = 'HTTPSAuthenticationFailed',
  RemoteDisconnection = 'RemoteDisconnection',
  HostDown = 'HostDown',
  RebaseConflicts = 'RebaseConflicts',
  MergeConflicts = 'MergeConflicts',
  HTTPSRepositoryNotFound = 'HTTPSRepositoryNotFound',
  SSHRepositoryNotFound = 'SSHRepositoryNotFound',
  PushNotFastForward = 'PushNotFastForward',
  BranchDeletionFailed = 'BranchDeletionFailed',
  DefaultBranchDeletionFailed = 'DefaultBranchDeletionFailed',
  RevertConflicts = 'RevertConflicts',
  EmptyRebasePatch = 'EmptyRebasePatch',
  NoMatchingRemoteBranch = 'NoMatchingRemoteBranch',
  NoExistingRemoteBranch = 'NoExistingRemoteBranch',
  NothingToCommit = 'NothingToCommit',
  NoSubmoduleMapping = 'NoSubmoduleMapping',
  SubmoduleRepositoryDoesNotExist = 'SubmoduleRepositoryDoesNotExist',
  InvalidSubmoduleSHA = 'InvalidSubmoduleSHA',
  LocalPermissionDenied = 'LocalPermissionDenied',
  InvalidMerge = 'InvalidMerge',
  InvalidRebase = 'InvalidRebase',
  NonFastForwardMergeIntoEmptyHead = 'NonFastForwardMergeIntoEmptyHead',
  PatchDoesNotApply = 'PatchDoesNotApply',
  BranchAlreadyExists = 'BranchAlreadyExists',
  BadRevision = 'BadRevision',
  NotAGitRepository = 'NotAGitRepository',
  CannotMergeUnrelatedHistories = 'CannotMergeUnrelatedHistories',
  LFSAttributeDoesNotMatch = 'LFSAttributeDoesNotMatch',
  BranchRenameFailed = 'BranchRenameFailed',
  PathDoesNotExist = 'PathDoesNotExist',
  InvalidObjectName = 'InvalidObjectName',
  OutsideRepository = 'OutsideRepository',
  LockFileAlreadyExists = 'LockFileAlreadyExists',
  NoMergeToAbort = 'NoMergeToAbort',
  LocalChangesOverwritten = 'LocalChangesOverwritten',
  UnresolvedConflicts = 'UnresolvedConflicts',
  GPGFailedToSignData = 'GPGFailedToSignData',
  ConflictModifyDeletedInBranch = 'ConflictModifyDeletedInBranch',
  // GitHub-specific push rejections
  PushWithFileSizeExceedingLimit = 'PushWithFileSizeExceedingLimit',
  HexBranchNameRejected = 'HexBranchNameRejected',
  ForcePushRejected = 'ForcePushRejected',
  InvalidRefLength = 'InvalidRefLength',
  ProtectedBranchRequiresReview = 'ProtectedBranchRequiresReview',
  ProtectedBranchForcePush = 'ProtectedBranchForcePush',
  ProtectedBranchDeleteRejected = 'ProtectedBranchDeleteRejected',
  ProtectedBranchRequiredStatus = 'ProtectedBranchRequiredStatus',
  PushWithPrivateEmail = 'PushWithPrivateEmail',
  // End of GitHub-specific push rejections
  ConfigLockFileAlreadyExists = 'ConfigLockFileAlreadyExists',
  RemoteAlreadyExists = 'RemoteAlreadyExists',
  TagAlreadyExists = 'TagAlreadyExists',
  MergeWithLocalChanges = 'MergeWithLocalChanges',
  RebaseWithLocalChanges = 'RebaseWithLocalChanges',
  MergeCommitNoMainlineOption = 'MergeCommitNoMainlineOption',
  UnsafeDirectory = 'UnsafeDirectory',
  PathExistsButNotInRef = 'PathExistsButNotInRef',
}

/**
 * A single classification rule: the first rule whose pattern matches wins
 */
export interface GitErrorRule {
  pattern: RegExp;
  kind: GitErrorKind;
}

/**
 * Raw output of one git invocation
 */
export interface GitCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Library error codes
 */
export enum ReadoutErrorCode {
  /** A progress parser was built without any steps */
  NO_PROGRESS_STEPS = 'NO_PROGRESS_STEPS',
  /** A patch selection left no hunks to apply */
  EMPTY_PATCH = 'EMPTY_PATCH',
  /** Input exceeded a configured size limit */
  OUTPUT_TOO_LARGE = 'OUTPUT_TOO_LARGE',
  /** A git command exited with an unexpected code */
  COMMAND_FAILED = 'COMMAND_FAILED',
}

/**
 * Base class for errors raised by git-readout
 */
export class GitReadoutError extends Error {
  constructor(
    message: string,
    public readonly code: ReadoutErrorCode,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'GitReadoutError';
  }
}
