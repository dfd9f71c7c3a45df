/**
 * Wire version stamped on every contract.
 *
 * Increment whenever a contract field, a stage payload shape, or the
 * agent graph changes in a way a consumer would notice.
 */
export const CONTRACT_VERSION = '1.0';

export const CONTRACT_CHANGELOG: Record<string, string> = {
  '1.0': 'Initial contract - 7 agents, 7 stage payloads, 32 quality gates',
};
