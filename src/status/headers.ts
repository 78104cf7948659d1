/**
 * Branch header decoding for porcelain v2 `--branch` output
 */

import type { StatusHeader, StatusHeadersData } from './types.js';

const BRANCH_OID_RE = /^branch\.oid ([a-f0-9]+)$/;
const BRANCH_HEAD_RE = /^branch\.head (.*)$/;
const BRANCH_UPSTREAM_RE = /^branch\.upstream (.*)$/;
const BRANCH_AB_RE = /^branch\.ab \+(\d+) -(\d+)$/;

/**
 * Fold one header into the accumulated branch data
 */
export function parseStatusHeader(
  data: StatusHeadersData,
  header: StatusHeader
): StatusHeadersData {
  const value = header.value;

  const oid = BRANCH_OID_RE.exec(value);
  if (oid?.[1] !== undefined) {
    return { ...data, currentTip: oid[1] };
  }

  const head = BRANCH_HEAD_RE.exec(value);
  if (head?.[1] !== undefined) {
    return head[1] === '(detached)' ? data : { ...data, currentBranch: head[1] };
  }

  const upstream = BRANCH_UPSTREAM_RE.exec(value);
  if (upstream?.[1] !== undefined) {
    return { ...data, currentUpstreamBranch: upstream[1] };
  }

  const ab = BRANCH_AB_RE.exec(value);
  if (ab?.[1] !== undefined && ab[2] !== undefined) {
    return {
      ...data,
      branchAheadBehind: { ahead: parseInt(ab[1], 10), behind: parseInt(ab[2], 10) },
    };
  }

  return data;
}

/**
 * Decode every header; unknown headers are ignored
 */
export function parseStatusHeaders(headers: readonly StatusHeader[]): StatusHeadersData {
  return headers.reduce<StatusHeadersData>(parseStatusHeader, {});
}
