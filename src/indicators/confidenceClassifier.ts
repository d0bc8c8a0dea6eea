// src/indicators/confidenceClassifier.ts

import type { GammaBlastDetectorSettings } from "../core/config.js";
import type {
    ConfidenceLevel,
    TimeToBlastMinutes,
} from "../types/snapshotTypes.js";

export const TIME_TO_BLAST_BY_CONFIDENCE: Readonly<
    Record<ConfidenceLevel, TimeToBlastMinutes>
> = {
    CRITICAL: 3,
    VERY_HIGH: 10,
    HIGH: 20,
    MEDIUM: 30,
    LOW: 60,
};

export interface ConfidenceClassification {
    confidence: ConfidenceLevel;
    timeToBlastMin: TimeToBlastMinutes;
}

type TierSettings = GammaBlastDetectorSettings["confidence"];

/**
 * Table lookup over (probability, trigger count); first matching tier wins.
 * Probability comparisons are strict.
 */
export function classifyConfidence(
    probability: number,
    triggerCount: number,
    tiers: TierSettings
): ConfidenceClassification {
    const ordered: [ConfidenceLevel, TierSettings[keyof TierSettings]][] = [
        ["CRITICAL", tiers.critical],
        ["VERY_HIGH", tiers.veryHigh],
        ["HIGH", tiers.high],
        ["MEDIUM", tiers.medium],
    ];

    for (const [confidence, tier] of ordered) {
        if (
            probability > tier.minProbability &&
            triggerCount >= tier.minTriggers
        ) {
            return {
                confidence,
                timeToBlastMin: TIME_TO_BLAST_BY_CONFIDENCE[confidence],
            };
        }
    }

    return { confidence: "LOW", timeToBlastMin: TIME_TO_BLAST_BY_CONFIDENCE.LOW };
}
