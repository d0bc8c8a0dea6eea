// src/indicators/evaluators/gammaConcentrationEvaluator.ts

import type { SignalContribution } from "../../types/snapshotTypes.js";
import { FinancialMath } from "../../utils/financialMath.js";
import type {
    EvaluationContext,
    SignalEvaluator,
} from "../interfaces/detectorInterfaces.js";
import { fieldValues, formatSigma } from "./evaluatorUtils.js";

export class GammaConcentrationEvaluator implements SignalEvaluator {
    public readonly name = "gammaConcentration";

    public evaluate(context: EvaluationContext): SignalContribution | null {
        const { current, history, settings } = context;
        const z = FinancialMath.calculateZScore(
            current.gammaConcentration,
            fieldValues(history, "gammaConcentration")
        );
        if (z === null || z < settings.gammaConcentration.spikeZ) return null;

        return {
            probability: settings.gammaConcentration.weight,
            trigger: `Gamma Clustering (${formatSigma(z)})`,
        };
    }
}
