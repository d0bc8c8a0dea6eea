// src/indicators/evaluators/gexExtremeEvaluator.ts

import type { SignalContribution } from "../../types/snapshotTypes.js";
import type {
    EvaluationContext,
    SignalEvaluator,
} from "../interfaces/detectorInterfaces.js";

/**
 * Net GEX at an extreme of its recent range: above the upper percentile
 * reads as resistance, below the lower one as support.
 */
export class GexExtremeEvaluator implements SignalEvaluator {
    public readonly name = "gexExtreme";

    public evaluate(context: EvaluationContext): SignalContribution | null {
        const rank = context.gexPercentile;
        if (rank === null) return null;

        const cfg = context.settings.gexExtreme;
        if (rank > cfg.upperPercentile || rank < cfg.lowerPercentile) {
            return {
                probability: cfg.weight,
                trigger: `Extreme GEX (${rank.toFixed(0)}th percentile)`,
            };
        }
        return null;
    }
}
