// src/indicators/evaluators/ivSpikeEvaluator.ts

import type { SignalContribution } from "../../types/snapshotTypes.js";
import { FinancialMath } from "../../utils/financialMath.js";
import type {
    EvaluationContext,
    SignalEvaluator,
} from "../interfaces/detectorInterfaces.js";
import { fieldValues, formatSigma } from "./evaluatorUtils.js";

/**
 * ATM implied volatility far above its recent baseline.
 * Only the highest tier reached contributes.
 */
export class IvSpikeEvaluator implements SignalEvaluator {
    public readonly name = "ivSpike";

    public evaluate(context: EvaluationContext): SignalContribution | null {
        const { current, history, settings } = context;
        const z = FinancialMath.calculateZScore(
            current.atmIv,
            fieldValues(history, "atmIv")
        );
        if (z === null) return null;

        const cfg = settings.ivSpike;
        if (z >= cfg.strongZ) {
            return {
                probability: cfg.strongWeight,
                trigger: `IV Spike (${formatSigma(z)})`,
            };
        }
        if (z >= cfg.moderateZ) {
            return {
                probability: cfg.moderateWeight,
                trigger: `IV Spike (${formatSigma(z)})`,
            };
        }
        return null;
    }
}
