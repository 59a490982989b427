import { z } from "zod";

export const TIP_PERCENT_MIN = 0;
export const TIP_PERCENT_MAX = 50;

const NumberOrText = z.union([z.number(), z.string()]);

export const CalculateRequestSchema = z.object({
  bill: NumberOrText,
  tipPercent: z
    .number()
    .min(TIP_PERCENT_MIN, `tipPercent must be between ${TIP_PERCENT_MIN} and ${TIP_PERCENT_MAX}`)
    .max(TIP_PERCENT_MAX, `tipPercent must be between ${TIP_PERCENT_MIN} and ${TIP_PERCENT_MAX}`)
    .default(15),
  partySize: NumberOrText.default(1),
  roundUp: z.boolean().default(false),
  currency: z.string().trim().max(8).optional()
});

export type CalculateRequest = z.infer<typeof CalculateRequestSchema>;

export function parseCalculateRequest(body: unknown): CalculateRequest {
  return CalculateRequestSchema.parse(body ?? {});
}
