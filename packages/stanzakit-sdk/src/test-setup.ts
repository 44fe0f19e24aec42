/**
 * Global test setup file for Vitest.
 *
 * Silences console output so expected diagnostics from the logger
 * (registry fallbacks, callee failures) don't clutter test runs.
 * Tests that assert on logging spy on the console methods themselves.
 */

import { vi } from 'vitest'

vi.spyOn(console, 'info').mockImplementation(() => {})
vi.spyOn(console, 'warn').mockImplementation(() => {})
vi.spyOn(console, 'error').mockImplementation(() => {})
