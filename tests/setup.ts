/**
 * Jest setup file
 */

/// <reference types="jest" />

import { resetGlobalConfig } from '../src/config/global';

// ============================================================================
// GLOBAL SAFETY NET: Prevent real browser connections during tests.
// Test files that exercise the puppeteer backend provide their own mock.
// ============================================================================

jest.mock('puppeteer-core', () => {
  const connect = jest.fn().mockRejectedValue(new Error('[TEST SAFETY] Real browser not available in tests'));
  return {
    __esModule: true,
    default: { connect },
    connect,
  };
});

// ============================================================================

// Mock console.error for cleaner test output (capture supervisor logs)
const originalConsoleError = console.error;
let capturedLogs: string[] = [];

console.error = (...args: unknown[]) => {
  capturedLogs.push(args.map(String).join(' '));
};

export function getCapturedLogs(): string[] {
  return [...capturedLogs];
}

export function clearCapturedLogs(): void {
  capturedLogs = [];
}

// Reset all mocks and shared config before each test
beforeEach(() => {
  jest.clearAllMocks();
  clearCapturedLogs();
  resetGlobalConfig();
});

// Restore console after all tests
afterAll(() => {
  console.error = originalConsoleError;
});
