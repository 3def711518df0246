/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, vi } from 'vitest';

// Unset NO_COLOR environment variable to ensure consistent output between local and CI test runs
if (process.env['NO_COLOR'] !== undefined) {
  delete process.env['NO_COLOR'];
}

afterEach(() => {
  vi.unstubAllEnvs();
});
