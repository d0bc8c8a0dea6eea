// src/types/snapshotTypes.ts

/**
 * One sampled view of an option chain for a single (symbol, expiry) pair.
 *
 * Numeric metrics are `null` when the upstream row did not carry them; the
 * evaluator that depends on a missing metric simply does not fire.
 */
export interface MarketSnapshot {
    timestamp: number; // ms since epoch
    atmIv: number | null; // percentage
    atmOi: number | null;
    gammaConcentration: number | null; // 0..1
    netGex: number | null; // signed
    spotPrice: number | null;
    atmStrike: number | null;
    ceOiTotal: number | null;
    peOiTotal: number | null;
    ceIvAvg: number | null;
    peIvAvg: number | null;
}

/** Newest first, at most `maxHistoryLength` entries. */
export type HistoryWindow = readonly MarketSnapshot[];

export type NumericSnapshotField = Exclude<keyof MarketSnapshot, "timestamp">;

export type BlastDirection = "UPSIDE" | "DOWNSIDE" | "NEUTRAL";

export type ConfidenceLevel =
    | "CRITICAL"
    | "VERY_HIGH"
    | "HIGH"
    | "MEDIUM"
    | "LOW";

export type TimeToBlastMinutes = 3 | 10 | 20 | 30 | 60;

export type DetectionMode = "adaptive" | "fallback";

/**
 * Detector output. Snake-cased fields match the gamma_exposure_history
 * columns the dashboard reads.
 */
export interface GammaBlastSignal {
    readonly probability: number;
    readonly direction: BlastDirection;
    readonly confidence: ConfidenceLevel;
    readonly time_to_blast_min: TimeToBlastMinutes;
    readonly triggers: readonly string[];
    readonly risk_level: ConfidenceLevel;
}

export interface SignalContribution {
    probability: number;
    trigger: string;
}

export interface DirectionBreakdown {
    score: number;
    pcr: number | null;
    gexPercentile: number | null;
    ivSkew: "call" | "put" | "flat" | null;
    direction: BlastDirection;
}

export interface GammaBlastEvaluation {
    signal: GammaBlastSignal;
    mode: DetectionMode;
    historyLength: number;
    rawProbability: number;
    directionBreakdown: DirectionBreakdown | null;
}
