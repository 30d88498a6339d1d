import { fail, ok } from '../../../shared/domain/result';
import type { Result } from '../../../shared/domain/result';
import { OrderValidationError } from './order.errors';
import type { CardType } from './order.rules';
import {
  isCardExpired,
  isCardType,
  maskCardNumber,
  parseCardExpiration,
} from './order.rules';

export interface PaymentCardInput {
  cardType: string;
  cardNumber: string;
  cardHolderName: string;
  /** MM/YY */
  expiration: string;
}

export interface PaymentCardData {
  cardType: CardType;
  maskedNumber: string;
  cardHolderName: string;
  expiration: string;
}

const CARD_NUMBER_PATTERN = /^\d{12,19}$/;

/**
 * Payment card descriptor stored with the order. Only the masked number is
 * ever kept; set once at creation.
 */
export class PaymentCard {
  private constructor(private readonly data: Readonly<PaymentCardData>) {}

  static create(
    input: PaymentCardInput,
    now: Date,
  ): Result<PaymentCard, OrderValidationError> {
    const cardType = input.cardType.trim().toUpperCase();
    if (!isCardType(cardType)) {
      return fail(
        new OrderValidationError('card.cardType', `Unsupported card type: ${input.cardType}`),
      );
    }

    const digits = input.cardNumber.replace(/[\s-]/g, '');
    if (!CARD_NUMBER_PATTERN.test(digits)) {
      return fail(
        new OrderValidationError('card.cardNumber', 'Card number must have 12 to 19 digits'),
      );
    }

    const holder = input.cardHolderName.trim();
    if (holder.length === 0) {
      return fail(
        new OrderValidationError('card.cardHolderName', 'Card holder name must not be empty'),
      );
    }

    if (parseCardExpiration(input.expiration) === null) {
      return fail(
        new OrderValidationError('card.expiration', 'Card expiration must be MM/YY'),
      );
    }
    if (isCardExpired(input.expiration, now)) {
      return fail(new OrderValidationError('card.expiration', 'Card has expired'));
    }

    return ok(
      new PaymentCard(
        Object.freeze({
          cardType,
          maskedNumber: maskCardNumber(digits),
          cardHolderName: holder,
          expiration: input.expiration,
        }),
      ),
    );
  }

  static fromData(data: PaymentCardData): PaymentCard {
    return new PaymentCard(Object.freeze({ ...data }));
  }

  get cardType(): CardType {
    return this.data.cardType;
  }

  get maskedNumber(): string {
    return this.data.maskedNumber;
  }

  toData(): PaymentCardData {
    return { ...this.data };
  }
}
