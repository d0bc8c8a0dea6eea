// src/indicators/evaluators/pinRiskEvaluator.ts

import type { SignalContribution } from "../../types/snapshotTypes.js";
import { FinancialMath } from "../../utils/financialMath.js";
import type {
    EvaluationContext,
    SignalEvaluator,
} from "../interfaces/detectorInterfaces.js";

/**
 * Spot trading close to the ATM strike. Not statistical: needs no history.
 */
export class PinRiskEvaluator implements SignalEvaluator {
    public readonly name = "pinRisk";

    public evaluate(context: EvaluationContext): SignalContribution | null {
        const { spotPrice, atmStrike } = context.current;
        if (
            !FinancialMath.isFiniteNumber(spotPrice) ||
            !FinancialMath.isFiniteNumber(atmStrike) ||
            spotPrice <= 0
        ) {
            return null;
        }

        const distancePct =
            (FinancialMath.calculateAbs(spotPrice - atmStrike) / spotPrice) *
            100;
        if (distancePct >= context.settings.pinRisk.maxDistancePct) {
            return null;
        }

        return {
            probability: context.settings.pinRisk.weight,
            trigger: `Pin Risk (${distancePct.toFixed(2)}%)`,
        };
    }
}
