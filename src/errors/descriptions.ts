/**
 * User-facing descriptions of classified git failures
 */

import { GitErrorKind } from './types.js';

const AUTHENTICATION_FAILED =
  'Authentication failed. You may not have permission to access the repository, or it may have been archived. Check your credentials and access rights, then try again.';

const REPOSITORY_NOT_FOUND =
  'The repository does not seem to exist anymore. You may not have access, or it may have been deleted or renamed.';

/**
 * Describe a failure kind for display
 *
 * Some kinds have no generic description because the raw git output is the
 * more useful message; those return null.
 */
export function describe(kind: GitErrorKind): string | null {
  switch (kind) {
    case GitErrorKind.SSHKeyAuditUnverified:
      return 'The SSH key is unverified.';
    case GitErrorKind.SSHAuthenticationFailed:
    case GitErrorKind.SSHPermissionDenied:
    case GitErrorKind.HTTPSAuthenticationFailed:
      return AUTHENTICATION_FAILED;
    case GitErrorKind.RemoteDisconnection:
      return 'The remote disconnected. Check your Internet connection and try again.';
    case GitErrorKind.HostDown:
      return 'The host is down. Check your Internet connection and try again.';
    case GitErrorKind.RebaseConflicts:
      return 'We found some conflicts while trying to rebase. Please resolve the conflicts before continuing.';
    case GitErrorKind.MergeConflicts:
      return 'We found some conflicts while trying to merge. Please resolve the conflicts and commit the changes.';
    case GitErrorKind.HTTPSRepositoryNotFound:
    case GitErrorKind.SSHRepositoryNotFound:
      return REPOSITORY_NOT_FOUND;
    case GitErrorKind.PushNotFastForward:
      return 'The repository has been updated since you last pulled. Try pulling before pushing.';
    case GitErrorKind.BranchDeletionFailed:
      return 'Could not delete the branch. It was probably already deleted.';
    case GitErrorKind.DefaultBranchDeletionFailed:
      return "The branch is the repository's default branch and cannot be deleted.";
    case GitErrorKind.RevertConflicts:
      return 'To finish reverting, please merge and commit the changes.';
    case GitErrorKind.EmptyRebasePatch:
      return 'There aren’t any changes left to apply.';
    case GitErrorKind.NoMatchingRemoteBranch:
      return 'There aren’t any remote branches that match the current branch.';
    case GitErrorKind.NoExistingRemoteBranch:
      return 'The remote branch does not exist.';
    case GitErrorKind.NothingToCommit:
      return 'There are no changes to commit.';
    case GitErrorKind.NoSubmoduleMapping:
      return 'A submodule was removed from .gitmodules, but the folder still exists in the repository. Delete the folder, commit the change, then try again.';
    case GitErrorKind.SubmoduleRepositoryDoesNotExist:
      return 'A submodule points to a location which does not exist.';
    case GitErrorKind.InvalidSubmoduleSHA:
      return 'A submodule points to a commit which does not exist.';
    case GitErrorKind.LocalPermissionDenied:
      return 'Permission denied.';
    case GitErrorKind.InvalidMerge:
      return 'This is not something we can merge.';
    case GitErrorKind.InvalidRebase:
      return 'This is not something we can rebase.';
    case GitErrorKind.NonFastForwardMergeIntoEmptyHead:
      return 'The merge you attempted is not a fast-forward, so it cannot be performed on an empty branch.';
    case GitErrorKind.PatchDoesNotApply:
      return 'The requested changes conflict with one or more files in the repository.';
    case GitErrorKind.BranchAlreadyExists:
      return 'A branch with that name already exists.';
    case GitErrorKind.BadRevision:
      return 'Bad revision.';
    case GitErrorKind.NotAGitRepository:
      return 'This is not a git repository.';
    case GitErrorKind.CannotMergeUnrelatedHistories:
      return 'Unable to merge unrelated histories in this repository.';
    case GitErrorKind.LFSAttributeDoesNotMatch:
      return 'Git LFS attribute found in global Git configuration does not match the expected value.';
    case GitErrorKind.BranchRenameFailed:
      return 'The branch could not be renamed.';
    case GitErrorKind.PathDoesNotExist:
      return 'The path does not exist on disk.';
    case GitErrorKind.InvalidObjectName:
      return 'The object was not found in the Git repository.';
    case GitErrorKind.OutsideRepository:
      return 'This path is not a valid path inside the repository.';
    case GitErrorKind.LockFileAlreadyExists:
      return 'A lock file already exists in the repository, which blocks this operation from completing.';
    case GitErrorKind.NoMergeToAbort:
      return 'There is no merge in progress, so there is nothing to abort.';
    case GitErrorKind.LocalChangesOverwritten:
      return 'Unable to switch branches as there are working directory changes that would be overwritten. Please commit or stash your changes.';
    case GitErrorKind.UnresolvedConflicts:
      return 'There are unresolved conflicts in the working directory.';
    case GitErrorKind.PushWithFileSizeExceedingLimit:
      return "The push operation includes a file which exceeds GitHub's file size restriction of 100MB. Please remove the file from history and try again.";
    case GitErrorKind.HexBranchNameRejected:
      return 'The branch name cannot be a 40-character string of hexadecimal characters, as this is the format that Git uses for representing objects.';
    case GitErrorKind.ForcePushRejected:
      return 'The force push has been rejected for the current branch.';
    case GitErrorKind.InvalidRefLength:
      return 'A ref cannot be longer than 255 characters.';
    case GitErrorKind.ProtectedBranchRequiresReview:
      return 'This branch is protected and any changes require an approved review. Open a pull request with changes targeting this branch instead.';
    case GitErrorKind.ProtectedBranchForcePush:
      return 'This branch is protected from force-push operations.';
    case GitErrorKind.ProtectedBranchDeleteRejected:
      return 'This branch cannot be deleted from the remote repository because it is marked as protected.';
    case GitErrorKind.ProtectedBranchRequiredStatus:
      return 'The push was rejected by the remote server because a required status check has not been satisfied.';
    case GitErrorKind.PushWithPrivateEmail:
      return "Cannot push these commits as they contain an email address marked as private on GitHub. To push anyway, visit https://github.com/settings/emails, uncheck 'Keep my email address private', push your commits, then enable the setting again.";
    case GitErrorKind.ConfigLockFileAlreadyExists:
    case GitErrorKind.RemoteAlreadyExists:
    case GitErrorKind.TagAlreadyExists:
    case GitErrorKind.MergeWithLocalChanges:
    case GitErrorKind.RebaseWithLocalChanges:
    case GitErrorKind.GPGFailedToSignData:
    case GitErrorKind.ConflictModifyDeletedInBranch:
    case GitErrorKind.MergeCommitNoMainlineOption:
    case GitErrorKind.UnsafeDirectory:
    case GitErrorKind.PathExistsButNotInRef:
      return null;
  }
}
