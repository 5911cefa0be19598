/**
 * Global test setup for Vitest
 * This file runs before all tests
 */

import { afterAll, beforeEach, afterEach, vi } from 'vitest';
import { server } from './mocks/server';
import { clearCapturedRequests } from './mocks/handlers';

// Enable MSW mock server as soon as the setup file loads, so clients built
// at test-module load time (which capture globalThis.fetch) see the patched fetch
server.listen({ onUnhandledRequest: 'warn' });

// Reset handlers between tests
beforeEach(() => {
  server.resetHandlers();
  clearCapturedRequests();
  vi.clearAllMocks();
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

afterAll(() => {
  server.close();
});

// Global test environment variables
process.env.NODE_ENV = 'test';
process.env.OPENAI_API_KEY = 'sk-test-openai-key';
process.env.ANTHROPIC_API_KEY = 'sk-ant-test-key';
process.env.OPENROUTER_API_KEY = 'sk-or-test-key';
process.env.STRIPE_SECRET_KEY = 'sk_test_stripe';
process.env.STRIPE_WEBHOOK_SECRET = 'whsec_test';
