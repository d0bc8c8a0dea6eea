import { describe, it, expect } from "vitest";
import { Config } from "../src/core/config.js";
import { FallbackDetector } from "../src/indicators/fallbackDetector.js";
import { makeHistory, makeSnapshot } from "./helpers/snapshotFactory.js";

describe("indicators/FallbackDetector", () => {
    const settings = Config.GAMMA_BLAST;
    const detector = new FallbackDetector(
        settings.fallback,
        settings.maxProbability
    );
    // newest sample: atmIv 21, atmOi 100000, gammaConcentration 0.2
    const history = makeHistory(3);

    it("returns the base probability on a quiet tick", () => {
        expect(detector.detect(makeSnapshot(), history)).toEqual({
            probability: 0.1,
            direction: "NEUTRAL",
            confidence: "LOW",
            time_to_blast_min: 60,
            triggers: [],
            risk_level: "LOW",
        });
    });

    it("returns the base probability without any history", () => {
        const signal = detector.detect(makeSnapshot({ atmIv: 99 }), []);
        expect(signal.probability).toBe(0.1);
        expect(signal.triggers).toEqual([]);
    });

    it("flags rising IV", () => {
        const signal = detector.detect(makeSnapshot({ atmIv: 21.5 }), history);
        expect(signal.probability).toBe(0.25);
        expect(signal.triggers).toEqual(["IV Rising (0.50/tick)"]);
    });

    it("flags draining open interest", () => {
        const signal = detector.detect(
            makeSnapshot({ atmOi: 99_000 }),
            history
        );
        expect(signal.probability).toBe(0.25);
        expect(signal.triggers).toEqual(["OI Draining (-1000/tick)"]);
    });

    it("does not flag a drain at the threshold", () => {
        const signal = detector.detect(
            makeSnapshot({ atmOi: 99_500 }),
            history
        );
        expect(signal.triggers).toEqual([]);
    });

    it("adds every rule that fires", () => {
        const signal = detector.detect(
            makeSnapshot({
                atmIv: 21.5,
                atmOi: 99_000,
                gammaConcentration: 0.25,
            }),
            history
        );
        expect(signal.probability).toBe(0.5);
        expect(signal.triggers).toEqual([
            "IV Rising (0.50/tick)",
            "OI Draining (-1000/tick)",
            "Gamma Concentrating",
        ]);
        expect(signal.confidence).toBe("LOW");
        expect(signal.direction).toBe("NEUTRAL");
    });

    it("ignores missing fields", () => {
        const signal = detector.detect(
            makeSnapshot({ atmIv: null, atmOi: null, gammaConcentration: null }),
            history
        );
        expect(signal.probability).toBe(0.1);
        expect(signal.triggers).toEqual([]);
    });
});
