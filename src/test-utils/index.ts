/**
 * Test Utilities Module
 *
 * Shared fakes and cache resets for tests across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll, createFetchMock, jsonResponse } from '../../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  createFetchMock,
  jsonResponse,
  statusResponse,
  sseResponse,
  requestBody,
  requestUrl,
  rpcMethods,
  type FetchMock,
} from './fetch.js';
export { createFakeProvider, type FakeProvider } from './provider.js';
