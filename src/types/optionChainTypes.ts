// src/types/optionChainTypes.ts
import { z } from "zod";

const metric = z.number().finite().nullable().optional();

export const OptionChainRowSchema = z.object({
    strike: z.number().finite().positive(),
    ceOi: metric,
    peOi: metric,
    ceIv: metric,
    peIv: metric,
    ceGamma: metric,
    peGamma: metric,
});

export type OptionChainRow = z.infer<typeof OptionChainRowSchema>;

export interface StrikeGex {
    strike: number;
    ceGex: number;
    peGex: number;
    netGex: number;
}

export interface GammaProfile {
    strikes: StrikeGex[];
    netGex: number;
    totalPositiveGex: number;
    totalNegativeGex: number;
    zeroGammaLevel: number | null;
    atmStrike: number;
    gammaConcentration: number;
}
