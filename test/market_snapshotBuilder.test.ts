import { describe, it, expect } from "vitest";
import { SnapshotBuilder } from "../src/market/snapshotBuilder.js";
import { ChainValidationError } from "../src/utils/errorHandler.js";

// spot 100, multiplier 100 -> GEX scale 10_000 per unit gamma * OI
const CHAIN = [
    { strike: 105, ceOi: 400, peOi: 100, ceIv: 11, peIv: 0, ceGamma: 0.02, peGamma: 0.01 },
    { strike: 95, ceOi: 100, peOi: 300, ceIv: 14, peIv: 16, ceGamma: 0.01, peGamma: 0.02 },
    { strike: 100, ceOi: 200, peOi: 200, ceIv: 12, peIv: 14, ceGamma: 0.05, peGamma: 0.03 },
];

describe("market/SnapshotBuilder", () => {
    const builder = new SnapshotBuilder();

    it("condenses a chain into a snapshot", () => {
        const { snapshot } = builder.build(CHAIN, 100, 1_000, "NIFTY");

        expect(snapshot.timestamp).toBe(1_000);
        expect(snapshot.spotPrice).toBe(100);
        expect(snapshot.atmStrike).toBe(100);
        expect(snapshot.atmIv).toBe(13);
        expect(snapshot.atmOi).toBe(400);
        expect(snapshot.ceOiTotal).toBe(700);
        expect(snapshot.peOiTotal).toBe(600);
        expect(snapshot.ceIvAvg).toBeCloseTo(37 / 3, 10);
        // zero IV at strike 105 is treated as missing
        expect(snapshot.peIvAvg).toBe(15);
        expect(snapshot.netGex).toBeCloseTo(60_000, 6);
        expect(snapshot.gammaConcentration).toBeCloseTo(0.25, 10);
    });

    it("builds a per-strike gamma profile sorted by strike", () => {
        const { profile } = builder.build(CHAIN, 100, 1_000);

        expect(profile.strikes.map((s) => s.strike)).toEqual([95, 100, 105]);
        expect(profile.strikes[0]?.netGex).toBeCloseTo(-50_000, 6);
        expect(profile.strikes[1]?.ceGex).toBeCloseTo(100_000, 6);
        expect(profile.strikes[1]?.peGex).toBeCloseTo(-60_000, 6);
        expect(profile.strikes[2]?.netGex).toBeCloseTo(70_000, 6);
        expect(profile.totalPositiveGex).toBeCloseTo(110_000, 6);
        expect(profile.totalNegativeGex).toBeCloseTo(50_000, 6);
        expect(profile.zeroGammaLevel).toBe(100);
        expect(profile.atmStrike).toBe(100);
    });

    it("scales exposure with the contract multiplier", () => {
        const lots = new SnapshotBuilder({ contractMultiplier: 50 });
        const { snapshot } = lots.build(CHAIN, 100, 1_000);
        expect(snapshot.netGex).toBeCloseTo(30_000, 6);
    });

    it("picks the lower strike when spot sits between two", () => {
        const { snapshot } = builder.build(
            [
                { strike: 105, ceOi: 10, peOi: 10 },
                { strike: 95, ceOi: 20, peOi: 20 },
            ],
            100,
            1_000
        );
        expect(snapshot.atmStrike).toBe(95);
        expect(snapshot.atmOi).toBe(40);
    });

    it("reports missing metrics as null", () => {
        const { snapshot, profile } = builder.build(
            [{ strike: 100 }],
            100,
            1_000
        );
        expect(snapshot.atmIv).toBeNull();
        expect(snapshot.ceIvAvg).toBeNull();
        expect(snapshot.atmOi).toBe(0);
        expect(snapshot.netGex).toBe(0);
        expect(snapshot.gammaConcentration).toBe(0);
        expect(profile.zeroGammaLevel).toBe(100);
    });

    it("rejects a non-positive spot price", () => {
        expect(() => builder.build(CHAIN, 0, 1_000, "NIFTY")).toThrow(
            ChainValidationError
        );
        expect(() => builder.build(CHAIN, NaN, 1_000)).toThrow(
            "Invalid spot price: NaN"
        );
    });

    it("rejects malformed chains", () => {
        expect(() => builder.build([], 100, 1_000)).toThrow(
            ChainValidationError
        );
        expect(() => builder.build([{ strike: -5 }], 100, 1_000)).toThrow(
            /^Invalid option chain: 0\.strike/
        );
        expect(() => builder.build("not a chain", 100, 1_000)).toThrow(
            ChainValidationError
        );
    });

    it("carries the symbol on validation errors", () => {
        try {
            builder.build([], 100, 1_000, "BANKNIFTY");
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ChainValidationError);
            if (error instanceof ChainValidationError) {
                expect(error.symbol).toBe("BANKNIFTY");
            }
        }
    });
});
