import { z } from "zod";

export const ORDERS_TOPIC = "orders";

export const orderCreatedEventSchema = z.object({
  orderId: z.number().int(),
  userId: z.number().int(),
  productId: z.number(),
  quantity: z.number(),
  total: z.number(),
});

export type OrderCreatedEvent = z.infer<typeof orderCreatedEventSchema>;

export type DecodeResult =
  | { ok: true; event: OrderCreatedEvent }
  | { ok: false; reason: string };

// Shape only; range checks on productId and quantity live in ReservationEngine.
export function decodeOrderCreatedEvent(raw: Buffer | null): DecodeResult {
  if (!raw) {
    return { ok: false, reason: "empty message value" };
  }

  let data: unknown;
  try {
    data = JSON.parse(raw.toString());
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${(error as Error).message}` };
  }

  const parsed = orderCreatedEventSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join(", ");
    return { ok: false, reason: `Validation failed: ${issues}` };
  }

  return { ok: true, event: parsed.data };
}
