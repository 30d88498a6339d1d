import { fail, ok } from '../../../shared/domain/result';
import type { Result } from '../../../shared/domain/result';
import { OrderValidationError } from './order.errors';

export interface AddressData {
  street: string;
  city: string;
  state: string;
  country: string;
  zipCode: string;
}

const ADDRESS_FIELDS = [
  'street',
  'city',
  'state',
  'country',
  'zipCode',
] as const satisfies readonly (keyof AddressData)[];

/**
 * Shipping address. Immutable, compared by value.
 */
export class Address {
  private constructor(private readonly data: Readonly<AddressData>) {}

  static create(input: AddressData): Result<Address, OrderValidationError> {
    const normalized: AddressData = {
      street: input.street.trim(),
      city: input.city.trim(),
      state: input.state.trim(),
      country: input.country.trim(),
      zipCode: input.zipCode.trim(),
    };

    for (const field of ADDRESS_FIELDS) {
      if (normalized[field].length === 0) {
        return fail(
          new OrderValidationError(
            `address.${field}`,
            `Address ${field} must not be empty`,
          ),
        );
      }
    }

    return ok(new Address(Object.freeze(normalized)));
  }

  /**
   * Rehydrate from persisted data (already validated).
   */
  static fromData(data: AddressData): Address {
    return new Address(Object.freeze({ ...data }));
  }

  get street(): string {
    return this.data.street;
  }

  get city(): string {
    return this.data.city;
  }

  get state(): string {
    return this.data.state;
  }

  get country(): string {
    return this.data.country;
  }

  get zipCode(): string {
    return this.data.zipCode;
  }

  equals(other: Address): boolean {
    return ADDRESS_FIELDS.every((field) => this.data[field] === other.data[field]);
  }

  toData(): AddressData {
    return { ...this.data };
  }
}
