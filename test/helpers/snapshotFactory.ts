// test/helpers/snapshotFactory.ts
import type {
    MarketSnapshot,
    NumericSnapshotField,
} from "../../src/types/snapshotTypes.js";

export const BASE_TIME = 1_760_000_000_000;
export const TICK_MS = 180_000;

/**
 * A quiet current snapshot: no evaluator fires against makeHistory().
 */
export function makeSnapshot(
    overrides: Partial<MarketSnapshot> = {}
): MarketSnapshot {
    return {
        timestamp: BASE_TIME,
        atmIv: 20,
        atmOi: 100_000,
        gammaConcentration: 0.2,
        netGex: 5_500,
        spotPrice: 20_000,
        atmStrike: 20_200,
        ceOiTotal: 100_000,
        peOiTotal: 100_000,
        ceIvAvg: 20,
        peIvAvg: 20,
        ...overrides,
    };
}

const NUMERIC_FIELDS: readonly NumericSnapshotField[] = [
    "atmIv",
    "atmOi",
    "gammaConcentration",
    "netGex",
    "spotPrice",
    "atmStrike",
    "ceOiTotal",
    "peOiTotal",
    "ceIvAvg",
    "peIvAvg",
];

export type SeriesOverrides = Partial<
    Record<NumericSnapshotField, readonly (number | null)[]>
>;

/**
 * Newest-first window of `length` snapshots. Defaults:
 * atmIv alternates 21/19, atmOi and gammaConcentration are flat,
 * netGex is (i + 1) * 1000 for index i. `series[field][i]` replaces
 * the value at index i.
 */
export function makeHistory(
    length: number,
    series: SeriesOverrides = {}
): MarketSnapshot[] {
    const history: MarketSnapshot[] = [];
    for (let i = 0; i < length; i++) {
        const snapshot = makeSnapshot({
            timestamp: BASE_TIME - (i + 1) * TICK_MS,
            atmIv: i % 2 === 0 ? 21 : 19,
            netGex: (i + 1) * 1_000,
        });
        for (const field of NUMERIC_FIELDS) {
            const value = series[field]?.[i];
            if (value !== undefined) snapshot[field] = value;
        }
        history.push(snapshot);
    }
    return history;
}
