import { describe, it, expect, vi } from "vitest";
import { createMockLogger } from "../__mocks__/src/infrastructure/loggerInterface.js";
import { createDependencies } from "../src/core/dependencies.js";
import type { ISnapshotHistoryProvider } from "../src/storage/snapshotHistoryStore.js";
import { makeHistory, makeSnapshot } from "./helpers/snapshotFactory.js";

const resolver = { resolveExpiry: async (_symbol: string) => "2025-10-28" };

describe("core/dependencies", () => {
    it("wires the scanner to the in-process history store", async () => {
        const logger = createMockLogger();
        const deps = createDependencies(resolver, { logger });

        expect(logger.info).toHaveBeenCalledWith(
            "Gamma blast dependencies created",
            {
                symbols: ["NIFTY", "BANKNIFTY", "FINNIFTY"],
                minHistoryForAdaptive: 5,
                maxHistoryLength: 20,
            }
        );

        for (const snapshot of makeHistory(6).reverse()) {
            deps.historyStore.record("NIFTY", "2025-10-28", snapshot);
        }
        const result = await deps.scanner.scanSymbol("NIFTY", makeSnapshot());
        expect(result?.mode).toBe("adaptive");
        expect(result?.historyLength).toBe(6);
    });

    it("feeds built snapshots through the detector", () => {
        const deps = createDependencies(resolver, {
            logger: createMockLogger(),
        });
        const { snapshot } = deps.snapshotBuilder.build(
            [{ strike: 20_000, ceOi: 100, peOi: 100, ceIv: 15, peIv: 15 }],
            20_000,
            1_000
        );
        const signal = deps.detector.detect(snapshot, []);
        expect(signal.probability).toBe(0.1);
        expect(signal.confidence).toBe("LOW");
    });

    it("accepts an external history provider", async () => {
        const provider: ISnapshotHistoryProvider = {
            getRecentSnapshots: vi.fn(async () => makeHistory(10)),
        };
        const deps = createDependencies(resolver, {
            logger: createMockLogger(),
            historyProvider: provider,
        });

        const result = await deps.scanner.scanSymbol("BANKNIFTY", makeSnapshot());

        expect(provider.getRecentSnapshots).toHaveBeenCalledWith(
            "BANKNIFTY",
            "2025-10-28",
            20
        );
        expect(result?.historyLength).toBe(10);
    });
});
