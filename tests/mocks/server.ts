/**
 * MSW Mock Server
 *
 * Intercepts HTTP requests to provider and Stripe APIs and returns
 * controlled responses.
 */

import { setupServer } from 'msw/node';
import { handlers } from './handlers';

export const server = setupServer(...handlers);

// Export for custom handler overrides in tests
export { handlers };
