import type { GovernanceErrorCode } from '@crossvote/shared';

export interface GovernanceFailure {
  ok: false;
  code: GovernanceErrorCode;
  reason: string;
}

export function fail(code: GovernanceErrorCode, reason: string): GovernanceFailure {
  return { ok: false, code, reason };
}

