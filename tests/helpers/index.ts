/**
 * Test Helpers
 */

export * from './test-app';
export * from './test-data';
export * from './assertions';
export * from './stripe';
export * from './fake-provider';
