/**
 * Test Utilities - Unified Reset
 *
 * Clears the process-wide caches (environment variables, bundled data
 * files) so a test sees its own stubs.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';
import { _clearDataFileCache } from '../utils/data-files.js';

/**
 * Reset all module-level caches for test isolation.
 */
export function resetAll(): void {
  _clearEnvCache();
  _clearDataFileCache();
}
