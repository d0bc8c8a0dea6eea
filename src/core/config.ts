// src/core/config.ts
import dotenv from "dotenv";
dotenv.config();
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";

// ============================================================================
// GAMMA BLAST DETECTOR - every threshold and weight the detector reads
// ============================================================================
const weight = z.number().min(0).max(1);
const zThreshold = z.number().min(0.5).max(10);

export const ConfidenceTierSchema = z.object({
    minProbability: z.number().min(0).max(1),
    minTriggers: z.number().int().min(0).max(6),
});

export const GammaBlastDetectorSchema = z.object({
    // Mode selection
    minHistoryForAdaptive: z.number().int().min(3).max(20),
    maxHistoryLength: z.number().int().min(5).max(100),
    maxProbability: z.number().min(0.5).max(0.99),
    epsilon: z.number().positive().max(1),

    ivSpike: z.object({
        strongZ: zThreshold,
        strongWeight: weight,
        moderateZ: zThreshold,
        moderateWeight: weight,
    }),
    oiAcceleration: z.object({
        unwindZ: z.number().min(-10).max(-0.5),
        unwindWeight: weight,
        buildupZ: zThreshold,
        buildupWeight: weight,
    }),
    gammaConcentration: z.object({
        spikeZ: zThreshold,
        weight: weight,
    }),
    pinRisk: z.object({
        maxDistancePct: z.number().min(0.01).max(5),
        weight: weight,
    }),
    gexFlip: z.object({
        weight: weight,
    }),
    gexExtreme: z.object({
        upperPercentile: z.number().min(50).max(100),
        lowerPercentile: z.number().min(0).max(50),
        weight: weight,
    }),

    direction: z.object({
        bullishPcr: z.number().min(0.1).max(1),
        bearishPcr: z.number().min(1).max(5),
        pcrScore: z.number().int().min(0).max(10),
        gexUpperPercentile: z.number().min(50).max(100),
        gexLowerPercentile: z.number().min(0).max(50),
        gexScore: z.number().int().min(0).max(10),
        ivSkewRatio: z.number().min(1).max(2),
        ivSkewScore: z.number().int().min(0).max(10),
        upsideScore: z.number().int().min(1).max(20),
        downsideScore: z.number().int().min(-20).max(-1),
    }),

    confidence: z.object({
        critical: ConfidenceTierSchema,
        veryHigh: ConfidenceTierSchema,
        high: ConfidenceTierSchema,
        medium: ConfidenceTierSchema,
    }),

    fallback: z.object({
        baseProbability: z.number().min(0).max(0.5),
        ivVelocityThreshold: z.number().min(0).max(10),
        ivWeight: weight,
        oiVelocityThreshold: z.number().max(0),
        oiWeight: weight,
        gammaVelocityThreshold: z.number().min(0).max(1),
        gammaWeight: weight,
    }),
});

export type GammaBlastDetectorSettings = z.infer<
    typeof GammaBlastDetectorSchema
>;

// ============================================================================
// SCANNER - orchestration around the detector
// ============================================================================
export const ScannerSchema = z.object({
    symbols: z.array(z.string().min(1)).min(1),
    historyLimit: z.number().int().min(1).max(100),
    topBlastMinProbability: z.number().min(0).max(0.95),
    topBlastMaxAgeMs: z.number().int().min(60000).max(86400000).default(3600000),
    expiryCacheTtlMs: z.number().int().min(1000).max(86400000),
});

export type ScannerConfig = z.infer<typeof ScannerSchema>;

export const LoggingSchema = z.object({
    pretty: z.boolean(),
    level: z.enum(["debug", "info", "warn", "error"]),
});

export type LoggingConfig = z.infer<typeof LoggingSchema>;

export const ConfigSchema = z.object({
    gammaBlast: GammaBlastDetectorSchema,
    scanner: ScannerSchema,
    logging: LoggingSchema,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Cross-field rules zod cannot express per field.
 */
export function validateDetectorSettings(
    settings: GammaBlastDetectorSettings
): string[] {
    const errors: string[] = [];

    if (settings.ivSpike.strongZ <= settings.ivSpike.moderateZ) {
        errors.push("gammaBlast.ivSpike.strongZ must exceed moderateZ");
    }
    if (settings.direction.bullishPcr >= settings.direction.bearishPcr) {
        errors.push(
            "gammaBlast.direction.bullishPcr must be below bearishPcr"
        );
    }
    if (
        settings.gexExtreme.lowerPercentile >=
        settings.gexExtreme.upperPercentile
    ) {
        errors.push(
            "gammaBlast.gexExtreme.lowerPercentile must be below upperPercentile"
        );
    }
    if (settings.minHistoryForAdaptive > settings.maxHistoryLength) {
        errors.push(
            "gammaBlast.minHistoryForAdaptive must not exceed maxHistoryLength"
        );
    }

    return errors;
}

// Load and validate config.json
let rawConfig: unknown;
try {
    rawConfig = JSON.parse(
        readFileSync(resolve(process.cwd(), "config.json"), "utf-8")
    );
} catch {
    console.error("FATAL: Cannot read config.json");
    process.exit(1);
}

let cfg: AppConfig;
try {
    cfg = ConfigSchema.parse(rawConfig);
} catch (error) {
    console.error("FATAL: config.json validation failed");
    if (error instanceof z.ZodError) {
        console.error("Validation errors:");
        error.errors.forEach((err) => {
            console.error(`  - ${err.path.join(".")}: ${err.message}`);
        });
    }
    console.error("Fix config.json and restart.");
    process.exit(1);
}

const settingErrors = validateDetectorSettings(cfg.gammaBlast);
if (settingErrors.length > 0) {
    console.error("FATAL: gammaBlast configuration is inconsistent");
    settingErrors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
}

export class Config {
    static get GAMMA_BLAST(): GammaBlastDetectorSettings {
        return cfg.gammaBlast;
    }

    static get SCANNER(): ScannerConfig {
        return cfg.scanner;
    }

    static get LOGGING(): LoggingConfig {
        const envPretty = process.env["LOG_PRETTY"];
        const pretty =
            envPretty !== undefined
                ? envPretty === "true"
                : process.env["NODE_ENV"] === "development" ||
                  cfg.logging.pretty;
        return { ...cfg.logging, pretty };
    }

    /**
     * Validate configuration on startup
     */
    static validate(): void {
        if (cfg.scanner.symbols.length === 0) {
            throw new Error("Missing scanner.symbols configuration");
        }

        const errors = validateDetectorSettings(cfg.gammaBlast);
        if (errors.length > 0) {
            throw new Error(`Invalid gammaBlast configuration: ${errors[0]}`);
        }
    }
}
