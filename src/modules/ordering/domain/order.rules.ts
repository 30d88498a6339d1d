/**
 * Pure business rules for orders.
 * No dependencies on infrastructure - just domain logic.
 */

// ============ STATUS STATE MACHINE ============

export const ORDER_STATUSES = [
  'SUBMITTED',
  'AWAITING_STOCK_VALIDATION',
  'STOCK_CONFIRMED',
  'PAID',
  'SHIPPED',
  'CANCELLED',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export type OrderAction =
  | 'awaitValidation'
  | 'confirmStock'
  | 'rejectStock'
  | 'pay'
  | 'ship'
  | 'cancel';

const VALID_TRANSITIONS: Record<OrderStatus, readonly OrderAction[]> = {
  SUBMITTED: ['awaitValidation', 'cancel'],
  AWAITING_STOCK_VALIDATION: ['confirmStock', 'rejectStock', 'cancel'],
  STOCK_CONFIRMED: ['pay', 'cancel'],
  PAID: ['ship'],
  SHIPPED: [],
  CANCELLED: [],
};

const ACTION_TARGETS: Record<OrderAction, OrderStatus> = {
  awaitValidation: 'AWAITING_STOCK_VALIDATION',
  confirmStock: 'STOCK_CONFIRMED',
  rejectStock: 'CANCELLED',
  pay: 'PAID',
  ship: 'SHIPPED',
  cancel: 'CANCELLED',
};

export function canTransition(
  currentStatus: OrderStatus,
  action: OrderAction,
): boolean {
  return VALID_TRANSITIONS[currentStatus].includes(action);
}

export function getNextStatus(
  currentStatus: OrderStatus,
  action: OrderAction,
): OrderStatus | null {
  return canTransition(currentStatus, action) ? ACTION_TARGETS[action] : null;
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

export function getInvalidTransitionReason(
  currentStatus: OrderStatus,
  action: OrderAction,
): string | null {
  if (canTransition(currentStatus, action)) {
    return null;
  }

  if (currentStatus === ACTION_TARGETS[action]) {
    return `Order is already ${currentStatus}`;
  }

  if (isTerminalStatus(currentStatus)) {
    return `Cannot ${action} an order that is ${currentStatus}`;
  }

  return `Cannot ${action} order with status ${currentStatus}`;
}

// ============ LINES & TOTALS ============

export const MAX_ORDER_LINES = 100;

export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function calculateLineTotal(line: {
  units: number;
  unitPrice: number;
  discount: number;
}): number {
  return roundToCents(line.units * line.unitPrice - line.discount);
}

export function calculateOrderTotal(
  lines: readonly { units: number; unitPrice: number; discount: number }[],
): number {
  return roundToCents(
    lines.reduce((sum, line) => sum + calculateLineTotal(line), 0),
  );
}

// ============ PAYMENT CARD ============

export const CARD_TYPES = ['AMEX', 'VISA', 'MASTERCARD'] as const;

export type CardType = (typeof CARD_TYPES)[number];

export function isCardType(value: string): value is CardType {
  return CARD_TYPES.some((type) => type === value);
}

/**
 * Keep only the last four digits: "4012888888881881" -> "************1881".
 */
export function maskCardNumber(cardNumber: string): string {
  const digits = cardNumber.replace(/[\s-]/g, '');
  const visible = digits.slice(-4);
  return '*'.repeat(Math.max(digits.length - 4, 0)) + visible;
}

/**
 * Parse an "MM/YY" expiration into the first instant after the card
 * expires (UTC). Returns null for malformed values.
 */
export function parseCardExpiration(expiration: string): Date | null {
  const match = /^(0[1-9]|1[0-2])\/(\d{2})$/.exec(expiration);
  if (!match) {
    return null;
  }
  const month = Number(match[1]);
  const year = 2000 + Number(match[2]);
  // Month is 1-based here, so this is the 1st of the following month
  return new Date(Date.UTC(year, month, 1));
}

export function isCardExpired(expiration: string, now: Date): boolean {
  const expiresAt = parseCardExpiration(expiration);
  return expiresAt === null || expiresAt.getTime() <= now.getTime();
}
