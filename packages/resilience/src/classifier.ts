import { errorKindOf } from '@steadfast/errors';

import type { RetryPolicy } from './types.js';

/**
 * Whether a failure of this kind may be retried under the policy. Values that
 * are not Steadfast errors classify as UNKNOWN and are never retried unless
 * the policy lists UNKNOWN explicitly.
 */
export function isRetryable(error: unknown, policy: Pick<RetryPolicy, 'retryableKinds'>): boolean {
  return policy.retryableKinds.has(errorKindOf(error));
}
