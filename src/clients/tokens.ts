export const INVENTORY_HTTP = Symbol('INVENTORY_HTTP');
export const DELIVERY_HTTP = Symbol('DELIVERY_HTTP');
