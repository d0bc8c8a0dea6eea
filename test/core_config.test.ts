import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const loadConfigModule = async () => import("../src/core/config.js");

describe("core/config", () => {
    const env = process.env;

    beforeEach(() => {
        vi.resetModules();
        process.env = { ...env };
    });

    afterEach(() => {
        process.env = env;
    });

    it("loads detector settings from config.json", async () => {
        const { Config } = await loadConfigModule();
        const settings = Config.GAMMA_BLAST;
        expect(settings.minHistoryForAdaptive).toBe(5);
        expect(settings.maxHistoryLength).toBe(20);
        expect(settings.maxProbability).toBe(0.95);
        expect(settings.ivSpike).toEqual({
            strongZ: 2.5,
            strongWeight: 0.25,
            moderateZ: 2,
            moderateWeight: 0.15,
        });
        expect(settings.confidence.critical).toEqual({
            minProbability: 0.7,
            minTriggers: 4,
        });
    });

    it("loads scanner settings", async () => {
        const { Config } = await loadConfigModule();
        expect(Config.SCANNER.symbols).toEqual(["NIFTY", "BANKNIFTY", "FINNIFTY"]);
        expect(Config.SCANNER.topBlastMinProbability).toBe(0.3);
        expect(Config.SCANNER.topBlastMaxAgeMs).toBe(3_600_000);
    });

    it("lets LOG_PRETTY override the logging config", async () => {
        process.env["LOG_PRETTY"] = "true";
        const { Config } = await loadConfigModule();
        expect(Config.LOGGING).toEqual({ pretty: true, level: "info" });
    });

    it("turns pretty logging on in development", async () => {
        delete process.env["LOG_PRETTY"];
        process.env["NODE_ENV"] = "development";
        const { Config } = await loadConfigModule();
        expect(Config.LOGGING.pretty).toBe(true);
    });

    it("validate passes for the shipped config", async () => {
        const { Config } = await loadConfigModule();
        expect(() => Config.validate()).not.toThrow();
    });

    it("rejects out-of-range detector settings", async () => {
        const { Config, GammaBlastDetectorSchema } = await loadConfigModule();
        const result = GammaBlastDetectorSchema.safeParse({
            ...Config.GAMMA_BLAST,
            maxProbability: 1.5,
        });
        expect(result.success).toBe(false);
    });

    it("reports inconsistent thresholds", async () => {
        const { Config, validateDetectorSettings } = await loadConfigModule();
        const base = Config.GAMMA_BLAST;
        const errors = validateDetectorSettings({
            ...base,
            ivSpike: { ...base.ivSpike, strongZ: 2, moderateZ: 2 },
            direction: { ...base.direction, bullishPcr: 1, bearishPcr: 1 },
            minHistoryForAdaptive: 20,
            maxHistoryLength: 10,
        });
        expect(errors).toEqual([
            "gammaBlast.ivSpike.strongZ must exceed moderateZ",
            "gammaBlast.direction.bullishPcr must be below bearishPcr",
            "gammaBlast.minHistoryForAdaptive must not exceed maxHistoryLength",
        ]);
    });
});
