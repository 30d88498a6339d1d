/**
 * Input shared by every command that acts on an existing order.
 */
export interface OrderCommandInput {
  orderId: string;
  idempotencyToken?: string;
  correlationId?: string;
}
