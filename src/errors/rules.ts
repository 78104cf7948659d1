/**
 * Ordered rule table mapping git failure output to a GitErrorKind
 *
 * Order matters: classification stops at the first matching rule, so a
 * pattern that is a more specific form of another must come before it.
 */

import { GitErrorKind, type GitErrorRule } from './types.js';

export const GIT_ERROR_RULES: readonly GitErrorRule[] = [
  // Must precede SSHPermissionDenied, whose text it contains
  {
    pattern: /ERROR: ([\s\S]+?)\n+\[EPOLICYKEYAGE\]\n+fatal: Could not read from remote repository./,
    kind: GitErrorKind.SSHKeyAuditUnverified,
  },
  // Must precede SSHAuthenticationFailed
  {
    pattern: /fatal: Authentication failed for 'https:\/\//,
    kind: GitErrorKind.HTTPSAuthenticationFailed,
  },
  { pattern: /fatal: Authentication failed/, kind: GitErrorKind.SSHAuthenticationFailed },
  { pattern: /fatal: Could not read from remote repository./, kind: GitErrorKind.SSHPermissionDenied },
  { pattern: /The requested URL returned error: 403/, kind: GitErrorKind.HTTPSAuthenticationFailed },
  { pattern: /fatal: [Tt]he remote end hung up unexpectedly/, kind: GitErrorKind.RemoteDisconnection },
  {
    pattern: /fatal: unable to access '(.+)': Failed to connect to (.+): Host is down/,
    kind: GitErrorKind.HostDown,
  },
  {
    pattern: /Cloning into '(.+)'...\nfatal: unable to access '(.+)': Could not resolve host: (.+)/,
    kind: GitErrorKind.HostDown,
  },
  {
    pattern: /Resolve all conflicts manually, mark them as resolved with/,
    kind: GitErrorKind.RebaseConflicts,
  },
  {
    pattern: /CONFLICT \(modify\/delete\): (.+) deleted in (.+) and modified in (.+)/,
    kind: GitErrorKind.ConflictModifyDeletedInBranch,
  },
  {
    pattern: /(Merge conflict|Automatic merge failed; fix conflicts and then commit the result)/,
    kind: GitErrorKind.MergeConflicts,
  },
  { pattern: /fatal: repository '(.+)' not found/, kind: GitErrorKind.HTTPSRepositoryNotFound },
  { pattern: /ERROR: Repository not found/, kind: GitErrorKind.SSHRepositoryNotFound },
  {
    pattern: /\((non-fast-forward|fetch first)\)\nerror: failed to push some refs to '.*'/,
    kind: GitErrorKind.PushNotFastForward,
  },
  {
    pattern: /error: unable to delete '(.+)': remote ref does not exist/,
    kind: GitErrorKind.BranchDeletionFailed,
  },
  {
    pattern: /\[remote rejected\] (.+) \(deletion of the current branch prohibited\)/,
    kind: GitErrorKind.DefaultBranchDeletionFailed,
  },
  {
    pattern:
      /error: could not revert .*\nhint: after resolving the conflicts, mark the corrected paths\nhint: with 'git add <paths>' or 'git rm <paths>'\nhint: and commit the result with 'git commit'/,
    kind: GitErrorKind.RevertConflicts,
  },
  {
    pattern:
      /Applying: .*\nNo changes - did you forget to use 'git add'\?\nIf there is nothing left to stage, chances are that something else\n.*/,
    kind: GitErrorKind.EmptyRebasePatch,
  },
  {
    pattern:
      /There are no candidates for (rebasing|merging) among the refs that you just fetched.\nGenerally this means that you provided a wildcard refspec which had no\nmatches on the remote end./,
    kind: GitErrorKind.NoMatchingRemoteBranch,
  },
  {
    pattern: /Your configuration specifies to merge with the ref '(.+)'\nfrom the remote, but no such ref was fetched./,
    kind: GitErrorKind.NoExistingRemoteBranch,
  },
  { pattern: /nothing to commit/, kind: GitErrorKind.NothingToCommit },
  {
    pattern: /[Nn]o submodule mapping found in .gitmodules for path '(.+)'/,
    kind: GitErrorKind.NoSubmoduleMapping,
  },
  {
    pattern: /fatal: repository '(.+)' does not exist\nfatal: clone of '.+' into submodule path '(.+)' failed/,
    kind: GitErrorKind.SubmoduleRepositoryDoesNotExist,
  },
  {
    pattern:
      /Fetched in submodule path '(.+)', but it did not contain (.+). Direct fetching of that commit failed./,
    kind: GitErrorKind.InvalidSubmoduleSHA,
  },
  {
    pattern: /fatal: could not create work tree dir '(.+)'.*: Permission denied/,
    kind: GitErrorKind.LocalPermissionDenied,
  },
  { pattern: /merge: (.+) - not something we can merge/, kind: GitErrorKind.InvalidMerge },
  { pattern: /invalid upstream (.+)/, kind: GitErrorKind.InvalidRebase },
  {
    pattern: /fatal: Non-fast-forward commit does not make sense into an empty head/,
    kind: GitErrorKind.NonFastForwardMergeIntoEmptyHead,
  },
  {
    pattern: /error: (.+): (patch does not apply|already exists in working directory)/,
    kind: GitErrorKind.PatchDoesNotApply,
  },
  { pattern: /fatal: [Aa] branch named '(.+)' already exists.?/, kind: GitErrorKind.BranchAlreadyExists },
  { pattern: /fatal: bad revision '(.*)'/, kind: GitErrorKind.BadRevision },
  {
    pattern: /fatal: [Nn]ot a git repository \(or any of the parent directories\): (.*)/,
    kind: GitErrorKind.NotAGitRepository,
  },
  {
    pattern: /fatal: refusing to merge unrelated histories/,
    kind: GitErrorKind.CannotMergeUnrelatedHistories,
  },
  { pattern: /The .+ attribute should be .+ but is .+/, kind: GitErrorKind.LFSAttributeDoesNotMatch },
  { pattern: /fatal: Branch rename failed/, kind: GitErrorKind.BranchRenameFailed },
  { pattern: /fatal: path '(.+)' does not exist .+/, kind: GitErrorKind.PathDoesNotExist },
  { pattern: /fatal: invalid object name '(.+)'./, kind: GitErrorKind.InvalidObjectName },
  { pattern: /fatal: .+: '(.+)' is outside repository/, kind: GitErrorKind.OutsideRepository },
  {
    pattern: /Another git process seems to be running in this repository, e.g./,
    kind: GitErrorKind.LockFileAlreadyExists,
  },
  { pattern: /fatal: There is no merge to abort/, kind: GitErrorKind.NoMergeToAbort },
  {
    pattern:
      /error: (?:Your local changes to the following|The following untracked working tree) files would be overwritten by checkout:/,
    kind: GitErrorKind.LocalChangesOverwritten,
  },
  {
    pattern:
      /You must edit all merge conflicts and then\nmark them as resolved using git add|fatal: Exiting because of an unresolved conflict/,
    kind: GitErrorKind.UnresolvedConflicts,
  },
  { pattern: /error: gpg failed to sign the data/, kind: GitErrorKind.GPGFailedToSignData },
  // GitHub-specific push rejections
  { pattern: /error: GH001: /, kind: GitErrorKind.PushWithFileSizeExceedingLimit },
  { pattern: /error: GH002: /, kind: GitErrorKind.HexBranchNameRejected },
  {
    pattern: /error: GH003: Sorry, force-pushing to (.+) is not allowed./,
    kind: GitErrorKind.ForcePushRejected,
  },
  {
    pattern: /error: GH005: Sorry, refs longer than (.+) bytes are not allowed/,
    kind: GitErrorKind.InvalidRefLength,
  },
  {
    pattern:
      /error: GH006: Protected branch update failed for (.+)\nremote: error: At least one approved review is required/,
    kind: GitErrorKind.ProtectedBranchRequiresReview,
  },
  {
    pattern:
      /error: GH006: Protected branch update failed for (.+)\nremote: error: Cannot force-push to a protected branch/,
    kind: GitErrorKind.ProtectedBranchForcePush,
  },
  {
    pattern:
      /error: GH006: Protected branch update failed for (.+).\nremote: error: Cannot delete a protected branch/,
    kind: GitErrorKind.ProtectedBranchDeleteRejected,
  },
  {
    pattern:
      /error: GH006: Protected branch update failed for (.+).\nremote: error: Required status check "(.+)" is expected/,
    kind: GitErrorKind.ProtectedBranchRequiredStatus,
  },
  {
    pattern: /error: GH007: Your push would publish a private email address./,
    kind: GitErrorKind.PushWithPrivateEmail,
  },
  // End of GitHub-specific push rejections
  {
    pattern: /error: could not lock config file (.+): File exists/,
    kind: GitErrorKind.ConfigLockFileAlreadyExists,
  },
  { pattern: /error: remote (.+) already exists./, kind: GitErrorKind.RemoteAlreadyExists },
  { pattern: /fatal: tag '(.+)' already exists/, kind: GitErrorKind.TagAlreadyExists },
  {
    pattern: /error: Your local changes to the following files would be overwritten by merge:\n/,
    kind: GitErrorKind.MergeWithLocalChanges,
  },
  {
    pattern:
      /error: cannot (pull with rebase|rebase): You have unstaged changes\.\n\s*error: [Pp]lease commit or stash them\./,
    kind: GitErrorKind.RebaseWithLocalChanges,
  },
  {
    pattern: /error: commit (.+) is a merge but no -m option was given/,
    kind: GitErrorKind.MergeCommitNoMainlineOption,
  },
  {
    pattern: /fatal: detected dubious ownership in repository at (.+)/,
    kind: GitErrorKind.UnsafeDirectory,
  },
  {
    pattern: /fatal: path '(.+)' exists on disk, but not in '(.+)'/,
    kind: GitErrorKind.PathExistsButNotInRef,
  },
];
