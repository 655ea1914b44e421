/** Envelope shared by this service's order/payment routes and its sibling services. */
export interface StdResponse<T> {
  data: T | null;
  message: string | null;
}

export function stdResponse<T>(data: T, message: string): StdResponse<T> {
  return { data, message };
}
