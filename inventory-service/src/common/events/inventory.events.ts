export const INVENTORY_RESERVED_TOPIC = "inventory-reserved";
export const INVENTORY_FAILED_TOPIC = "inventory-failed";

export type InventoryStatus = "RESERVED" | "FAILED";

export interface InventoryOutcomeEvent {
  orderId: number;
  status: InventoryStatus;
  message: string;
}

export const OutcomeMessages = {
  reserved: "Reserved successfully",
  notEnoughStock: "Not enough stock",
  productNotFound: "Product not found",
  invalidEvent: "invalid event",
  transientError: "transient error",
} as const;
