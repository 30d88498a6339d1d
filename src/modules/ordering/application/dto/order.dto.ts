import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class AddressDto {
  @ApiProperty({ example: '1 Main St' })
  @IsString()
  @IsNotEmpty()
  street!: string;

  @ApiProperty({ example: 'Springfield' })
  @IsString()
  @IsNotEmpty()
  city!: string;

  @ApiProperty({ example: 'IL' })
  @IsString()
  @IsNotEmpty()
  state!: string;

  @ApiProperty({ example: 'US' })
  @IsString()
  @IsNotEmpty()
  country!: string;

  @ApiProperty({ example: '62701' })
  @IsString()
  @IsNotEmpty()
  zipCode!: string;
}

export class PaymentCardDto {
  @ApiProperty({ example: 'VISA', description: 'AMEX, VISA or MASTERCARD' })
  @IsString()
  cardType!: string;

  @ApiProperty({
    example: '4111111111111111',
    description: 'Only the last four digits are stored',
  })
  @IsString()
  cardNumber!: string;

  @ApiProperty({ example: 'Ada Buyer' })
  @IsString()
  @IsNotEmpty()
  cardHolderName!: string;

  @ApiProperty({ example: '12/29', description: 'MM/YY' })
  @Matches(/^(0[1-9]|1[0-2])\/\d{2}$/, { message: 'expiration must be MM/YY' })
  expiration!: string;
}

export class OrderItemDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  productId!: number;

  @ApiProperty({ example: 'Ceramic mug' })
  @IsString()
  @IsNotEmpty()
  productName!: string;

  @ApiProperty({ example: 10.5 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  unitPrice!: number;

  @ApiPropertyOptional({ example: 0 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  discount?: number;

  @ApiPropertyOptional({ example: 'https://img.example.com/mug.png' })
  @IsOptional()
  @IsString()
  pictureUrl?: string;

  @ApiProperty({ example: 2 })
  @IsInt()
  @Min(1)
  units!: number;
}

export class CreateOrderDto {
  @ApiProperty({ example: 'buyer-42' })
  @IsString()
  @IsNotEmpty()
  buyerId!: string;

  @ApiProperty({ example: 'Ada Buyer' })
  @IsString()
  @IsNotEmpty()
  buyerName!: string;

  @ApiProperty({ type: AddressDto })
  @ValidateNested()
  @Type(() => AddressDto)
  address!: AddressDto;

  @ApiProperty({ type: PaymentCardDto })
  @ValidateNested()
  @Type(() => PaymentCardDto)
  card!: PaymentCardDto;

  @ApiProperty({ type: [OrderItemDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => OrderItemDto)
  items!: OrderItemDto[];

  @ApiPropertyOptional({
    description: 'Used when no Idempotency-Key header is sent',
  })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  idempotencyToken?: string;
}

export class ConfirmStockDto {
  @ApiPropertyOptional({
    type: [Number],
    description: 'Products that could not be reserved; omit when all were',
  })
  @IsOptional()
  @IsArray()
  @IsInt({ each: true })
  @Min(1, { each: true })
  rejectedProductIds?: number[];
}

export class CancelOrderDto {
  @ApiPropertyOptional({ example: 'payment declined' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
