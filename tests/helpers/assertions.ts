/**
 * Custom Test Assertions
 */

import { expect } from 'vitest';
import type { ErrorBody, ErrorKind } from '../../src/errors';
import { getResponseBody } from './test-app';

/**
 * Assert an error response: status, error_kind and the common envelope.
 */
export async function expectError(response: Response, status: number, kind: ErrorKind): Promise<ErrorBody> {
  expect(response.status).toBe(status);
  const body = await getResponseBody<ErrorBody>(response);
  expect(body.status).toBe('error');
  expect(body.error_kind).toBe(kind);
  expect(typeof body.message).toBe('string');
  return body;
}

/**
 * Assert a reachable state sequence ending in COMPLETED.
 */
export function expectCompletedStates(states: Array<{ state: string }>) {
  expect(states.map((s) => s.state)).toEqual([
    'RECEIVED',
    'CREDIT_RESERVED',
    'PROVIDER_CALLED',
    'CONTRACT_VALIDATED',
    'BILLED',
    'COMPLETED',
  ]);
}
