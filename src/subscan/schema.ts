import { z } from "zod";

// Amounts arrive as integer strings, occasionally as plain numbers
const rawAmount = z.union([z.string(), z.number()]).nullish();

/** Older API versions send `params` as a JSON encoded string */
const decodeJsonString = (value: unknown): unknown => {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
};

export const transferSchema = z
  .object({
    amount: rawAmount,
    from: z.string().nullish(),
    to: z.string().nullish(),
    decimals: z.union([z.number(), z.string()]).nullish(),
    symbol: z.string().nullish(),
  })
  .passthrough();

export const paramSchema = z
  .object({
    name: z.string(),
    type: z.string().nullish(),
    value: z.unknown(),
  })
  .passthrough();

export const extrinsicSchema = z
  .object({
    extrinsic_hash: z.string().nullish(),
    account_id: z.string().nullish(),
    account_display: z
      .object({ address: z.string().nullish() })
      .passthrough()
      .nullish(),
    success: z.boolean().nullish(),
    fee: rawAmount,
    fee_used: rawAmount,
    transfer: transferSchema.nullish(),
    params: z.preprocess(decodeJsonString, z.array(paramSchema).nullish()),
  })
  .passthrough();

export const envelopeSchema = z.object({
  code: z.number().nullish(),
  message: z.string().nullish(),
  generated_at: z.number().nullish(),
  data: extrinsicSchema.nullish(),
});

export type ExtrinsicParam = z.infer<typeof paramSchema>;
export type Extrinsic = z.infer<typeof extrinsicSchema>;
