/** Routing keys this service publishes through the outbox. */
export const InventoryEvents = {
  RESERVE_ORDER: 'inventory.reserve_order',
  CANCEL_ORDER: 'inventory.cancel_order',
} as const;

export const DeliveryEvents = {
  ORDER_REQUEST: 'delivery.order_request',
} as const;

export interface OrderItemPayload {
  product_id: number;
  quantity: number;
}

export interface InventoryOrderPayload {
  order_id: number;
  order_items: OrderItemPayload[];
}

export interface DeliveryRequestPayload {
  delivery_address: Record<string, unknown> | null;
  order_id: number;
  order_type: string;
}
