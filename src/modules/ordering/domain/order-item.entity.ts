import { fail, ok } from '../../../shared/domain/result';
import type { Result } from '../../../shared/domain/result';
import { OrderValidationError } from './order.errors';
import { calculateLineTotal, roundToCents } from './order.rules';

export interface OrderItemData {
  productId: number;
  productName: string;
  unitPrice: number;
  discount: number;
  pictureUrl: string | null;
  units: number;
}

export type NewOrderItem = Omit<OrderItemData, 'discount' | 'pictureUrl'> &
  Partial<Pick<OrderItemData, 'discount' | 'pictureUrl'>>;

function validateUnits(units: number): OrderValidationError | null {
  if (!Number.isInteger(units) || units <= 0) {
    return new OrderValidationError('units', 'Units must be a positive integer');
  }
  return null;
}

function validateDiscount(
  discount: number,
  units: number,
  unitPrice: number,
): OrderValidationError | null {
  if (!Number.isFinite(discount) || discount < 0) {
    return new OrderValidationError('discount', 'Discount must not be negative');
  }
  if (discount > roundToCents(units * unitPrice)) {
    return new OrderValidationError(
      'discount',
      'Discount must not exceed the line total',
    );
  }
  return null;
}

/**
 * A line of an order. Owned by the Order aggregate: only the aggregate
 * creates or changes lines, readers get snapshots via toData().
 */
export class OrderItem {
  private constructor(private props: OrderItemData) {}

  static create(input: NewOrderItem): Result<OrderItem, OrderValidationError> {
    if (!Number.isInteger(input.productId) || input.productId <= 0) {
      return fail(
        new OrderValidationError('productId', 'Product id must be a positive integer'),
      );
    }
    const productName = input.productName.trim();
    if (productName.length === 0) {
      return fail(
        new OrderValidationError('productName', 'Product name must not be empty'),
      );
    }
    if (!Number.isFinite(input.unitPrice) || input.unitPrice < 0) {
      return fail(
        new OrderValidationError('unitPrice', 'Unit price must not be negative'),
      );
    }

    const discount = input.discount ?? 0;
    const error =
      validateUnits(input.units) ??
      validateDiscount(discount, input.units, input.unitPrice);
    if (error) {
      return fail(error);
    }

    return ok(
      new OrderItem({
        productId: input.productId,
        productName,
        unitPrice: roundToCents(input.unitPrice),
        discount: roundToCents(discount),
        pictureUrl: input.pictureUrl ?? null,
        units: input.units,
      }),
    );
  }

  static fromData(data: OrderItemData): OrderItem {
    return new OrderItem({ ...data });
  }

  get productId(): number {
    return this.props.productId;
  }

  get units(): number {
    return this.props.units;
  }

  get discount(): number {
    return this.props.discount;
  }

  get total(): number {
    return calculateLineTotal(this.props);
  }

  /**
   * Fold another request for the same product into this line. Units add
   * up and the higher discount wins. Nothing changes on failure.
   */
  merge(units: number, discount = 0): Result<void, OrderValidationError> {
    const unitsError = validateUnits(units);
    if (unitsError) {
      return fail(unitsError);
    }

    if (!Number.isFinite(discount) || discount < 0) {
      return fail(
        new OrderValidationError('discount', 'Discount must not be negative'),
      );
    }

    const mergedUnits = this.props.units + units;
    const mergedDiscount = Math.max(this.props.discount, roundToCents(discount));
    const discountError = validateDiscount(
      mergedDiscount,
      mergedUnits,
      this.props.unitPrice,
    );
    if (discountError) {
      return fail(discountError);
    }

    this.props = { ...this.props, units: mergedUnits, discount: mergedDiscount };
    return ok();
  }

  toData(): Readonly<OrderItemData> {
    return Object.freeze({ ...this.props });
  }
}
