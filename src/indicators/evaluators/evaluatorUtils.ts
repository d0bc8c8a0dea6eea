// src/indicators/evaluators/evaluatorUtils.ts

import type {
    HistoryWindow,
    NumericSnapshotField,
} from "../../types/snapshotTypes.js";
import { FinancialMath } from "../../utils/financialMath.js";

/**
 * Values of one field as stored in the window (newest first, nulls kept).
 */
export function fieldValues(
    history: HistoryWindow,
    field: NumericSnapshotField
): (number | null)[] {
    return history.map((snapshot) => snapshot[field]);
}

/**
 * Finite values of one field, oldest first, ready for differencing.
 * Missing samples are skipped.
 */
export function oldestFirstSeries(
    history: HistoryWindow,
    field: NumericSnapshotField
): number[] {
    return FinancialMath.finiteValues(fieldValues(history, field)).reverse();
}

export function formatSigma(z: number): string {
    return `${z.toFixed(1)}σ`;
}
