// src/indicators/directionPredictor.ts

import type { GammaBlastDetectorSettings } from "../core/config.js";
import type {
    BlastDirection,
    DirectionBreakdown,
    MarketSnapshot,
} from "../types/snapshotTypes.js";
import { FinancialMath } from "../utils/financialMath.js";

/**
 * Weighted integer vote over positioning, independent of the blast
 * probability. Scores strictly inside (downsideScore, upsideScore) stay
 * NEUTRAL.
 */
export class DirectionPredictor {
    constructor(
        private readonly settings: GammaBlastDetectorSettings["direction"],
        private readonly epsilon: number
    ) {}

    public predict(
        current: MarketSnapshot,
        gexPercentile: number | null
    ): DirectionBreakdown {
        let score = 0;

        // Heavy call OI reads bullish, heavy put OI bearish
        const pcr = this.putCallRatio(current);
        if (pcr !== null) {
            if (pcr < this.settings.bullishPcr) score += this.settings.pcrScore;
            if (pcr > this.settings.bearishPcr) score -= this.settings.pcrScore;
        }

        // Extreme GEX above is resistance, below is support
        if (gexPercentile !== null) {
            if (gexPercentile > this.settings.gexUpperPercentile) {
                score -= this.settings.gexScore;
            }
            if (gexPercentile < this.settings.gexLowerPercentile) {
                score += this.settings.gexScore;
            }
        }

        const ivSkew = this.ivSkew(current);
        if (ivSkew === "call") score -= this.settings.ivSkewScore;
        if (ivSkew === "put") score += this.settings.ivSkewScore;

        return {
            score,
            pcr,
            gexPercentile,
            ivSkew,
            direction: this.mapScore(score),
        };
    }

    public mapScore(score: number): BlastDirection {
        if (score >= this.settings.upsideScore) return "UPSIDE";
        if (score <= this.settings.downsideScore) return "DOWNSIDE";
        return "NEUTRAL";
    }

    private putCallRatio(current: MarketSnapshot): number | null {
        const { ceOiTotal, peOiTotal } = current;
        if (
            !FinancialMath.isFiniteNumber(ceOiTotal) ||
            !FinancialMath.isFiniteNumber(peOiTotal)
        ) {
            return null;
        }
        return FinancialMath.safeDivide(peOiTotal, ceOiTotal, this.epsilon);
    }

    private ivSkew(current: MarketSnapshot): DirectionBreakdown["ivSkew"] {
        const { ceIvAvg, peIvAvg } = current;
        if (
            !FinancialMath.isFiniteNumber(ceIvAvg) ||
            !FinancialMath.isFiniteNumber(peIvAvg)
        ) {
            return null;
        }
        if (ceIvAvg > peIvAvg * this.settings.ivSkewRatio) return "call";
        if (peIvAvg > ceIvAvg * this.settings.ivSkewRatio) return "put";
        return "flat";
    }
}
