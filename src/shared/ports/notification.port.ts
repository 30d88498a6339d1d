/**
 * Port for telling a buyer about their order (email, SMS, push).
 *
 * Consumers depend on this interface; the provider adapter (SMTP, an SMS
 * gateway, ...) is bound in infrastructure. Nothing is bound by default.
 */
export interface NotificationPort {
  send(notification: NotificationRequest): Promise<NotificationResult>;
}

export type NotificationChannel = 'email' | 'sms' | 'push';

export interface NotificationRequest {
  channel: NotificationChannel;
  /** Recipient identifier (buyer id, email address, device token) */
  to: string;
  template: string;
  data: Record<string, unknown>;
  /** Providers that support it drop repeated sends with the same key */
  idempotencyKey?: string;
}

export interface NotificationResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export const NOTIFICATION_PORT = Symbol('NOTIFICATION_PORT');
