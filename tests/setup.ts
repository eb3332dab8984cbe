/**
 * Vitest Global Test Setup
 * @module tests/setup
 *
 * Silences logging and resets cached engine state between tests.
 */

import { afterEach, vi } from 'vitest';
import { resetConfig } from '../src/config/index.js';
import { resetLogger } from '../src/logging/logger.js';

// ============================================================================
// Environment Setup
// ============================================================================

// Set before any module creates a logger
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
delete process.env.LOG_PRETTY;
delete process.env.CLUSTER_CONFIG_FILE;

// ============================================================================
// Global Hooks
// ============================================================================

afterEach(() => {
  resetConfig();
  resetLogger();
  vi.restoreAllMocks();
});
