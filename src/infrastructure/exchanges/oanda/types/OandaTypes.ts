import { z } from 'zod';

const priceString = z.string().regex(/^-?\d+(\.\d+)?$/);

export const oandaCandleSchema = z.object({
    time: z.string(),
    complete: z.boolean(),
    volume: z.number().optional(),
    mid: z.object({
        o: priceString,
        h: priceString,
        l: priceString,
        c: priceString
    })
});

export const oandaCandlesResponseSchema = z.object({
    instrument: z.string().optional(),
    granularity: z.string().optional(),
    candles: z.array(oandaCandleSchema)
});

export type OandaCandleData = z.infer<typeof oandaCandleSchema>;
