/**
 * Test utilities for logger mocking
 */

import { vi } from 'vitest';
import type { Logger, LogLevel } from './types.js';

/**
 * Creates a mock logger whose methods are all vi.fn() spies.
 */
export function createMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        createChild: vi.fn(() => mockLogger),
        destroy: vi.fn(async () => {}),
        setLevel: vi.fn(),
        getLevel: vi.fn((): LogLevel => 'info'),
    };
    return mockLogger;
}
