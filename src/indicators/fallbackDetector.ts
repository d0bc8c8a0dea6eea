// src/indicators/fallbackDetector.ts

import type { GammaBlastDetectorSettings } from "../core/config.js";
import type {
    GammaBlastSignal,
    HistoryWindow,
    MarketSnapshot,
    NumericSnapshotField,
} from "../types/snapshotTypes.js";
import { FinancialMath } from "../utils/financialMath.js";

/**
 * Constant-threshold scorer for windows too short to carry a statistical
 * baseline. Always LOW / NEUTRAL / 60 minutes; only probability and
 * triggers vary.
 */
export class FallbackDetector {
    constructor(
        private readonly settings: GammaBlastDetectorSettings["fallback"],
        private readonly maxProbability: number
    ) {}

    public detect(
        current: MarketSnapshot,
        history: HistoryWindow
    ): GammaBlastSignal {
        let probability = this.settings.baseProbability;
        const triggers: string[] = [];

        const ivVelocity = this.latestVelocity(current, history, "atmIv");
        if (
            ivVelocity !== null &&
            ivVelocity > this.settings.ivVelocityThreshold
        ) {
            probability += this.settings.ivWeight;
            triggers.push(`IV Rising (${ivVelocity.toFixed(2)}/tick)`);
        }

        const oiVelocity = this.latestVelocity(current, history, "atmOi");
        if (
            oiVelocity !== null &&
            oiVelocity < this.settings.oiVelocityThreshold
        ) {
            probability += this.settings.oiWeight;
            triggers.push(`OI Draining (${oiVelocity.toFixed(0)}/tick)`);
        }

        const gammaVelocity = this.latestVelocity(
            current,
            history,
            "gammaConcentration"
        );
        if (
            gammaVelocity !== null &&
            gammaVelocity > this.settings.gammaVelocityThreshold
        ) {
            probability += this.settings.gammaWeight;
            triggers.push("Gamma Concentrating");
        }

        return {
            probability: FinancialMath.financialRound(
                Math.min(probability, this.maxProbability),
                6
            ),
            direction: "NEUTRAL",
            confidence: "LOW",
            time_to_blast_min: 60,
            triggers,
            risk_level: "LOW",
        };
    }

    /**
     * Current value minus the newest historical value; null when either
     * side is missing.
     */
    private latestVelocity(
        current: MarketSnapshot,
        history: HistoryWindow,
        field: NumericSnapshotField
    ): number | null {
        const previous = history[0]?.[field] ?? null;
        const now = current[field];
        if (
            !FinancialMath.isFiniteNumber(previous) ||
            !FinancialMath.isFiniteNumber(now)
        ) {
            return null;
        }
        return FinancialMath.firstDerivative([previous, now])[0] ?? null;
    }
}
