// test/vitest.setup.ts
import { EventEmitter } from "events";
import { vi, afterEach } from "vitest";

// Scanner tests attach several listeners per symbol
EventEmitter.defaultMaxListeners = 20;

afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
});
