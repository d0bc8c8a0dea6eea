// src/indicators/evaluators/gexFlipEvaluator.ts

import type { SignalContribution } from "../../types/snapshotTypes.js";
import { FinancialMath } from "../../utils/financialMath.js";
import type {
    EvaluationContext,
    SignalEvaluator,
} from "../interfaces/detectorInterfaces.js";

/**
 * Net dealer gamma crossed zero since the previous sample.
 * Zero itself has no sign, so touching zero is not a flip.
 */
export class GexFlipEvaluator implements SignalEvaluator {
    public readonly name = "gexFlip";

    public evaluate(context: EvaluationContext): SignalContribution | null {
        const currentGex = context.current.netGex;
        const previousGex = context.history[0]?.netGex ?? null;
        if (
            !FinancialMath.isFiniteNumber(currentGex) ||
            !FinancialMath.isFiniteNumber(previousGex)
        ) {
            return null;
        }

        if (Math.sign(currentGex) * Math.sign(previousGex) >= 0) return null;

        return {
            probability: context.settings.gexFlip.weight,
            trigger: "GEX Flip Detected",
        };
    }
}
