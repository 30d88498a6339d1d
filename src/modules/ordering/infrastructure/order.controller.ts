import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  ApiHeader,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import {
  CancelOrderDto,
  ConfirmStockDto,
  CreateOrderDto,
} from '../application/dto/order.dto';
import {
  CancelOrderUseCase,
  ConfirmStockUseCase,
  CreateOrderUseCase,
  GetOrderUseCase,
  MarkPaidUseCase,
  MarkShippedUseCase,
  SetAwaitingValidationUseCase,
} from '../application/use-cases';
import type {
  OrderCommandError,
  OrderCommandResult,
} from '../application/order-command.result';

const IDEMPOTENCY_HEADER = 'idempotency-key';
const CORRELATION_HEADER = 'x-correlation-id';

@ApiTags('orders')
@ApiHeader({ name: 'X-Correlation-Id', required: false })
@Controller('orders')
export class OrderController {
  constructor(
    private readonly createOrderUseCase: CreateOrderUseCase,
    private readonly getOrderUseCase: GetOrderUseCase,
    private readonly setAwaitingValidationUseCase: SetAwaitingValidationUseCase,
    private readonly confirmStockUseCase: ConfirmStockUseCase,
    private readonly markPaidUseCase: MarkPaidUseCase,
    private readonly markShippedUseCase: MarkShippedUseCase,
    private readonly cancelOrderUseCase: CancelOrderUseCase,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Place an order' })
  @ApiHeader({ name: 'Idempotency-Key', required: false })
  @ApiResponse({ status: 201, description: 'Order submitted (or replayed)' })
  @ApiResponse({ status: 400, description: 'Validation error or missing token' })
  @ApiResponse({ status: 422, description: 'Token already used by another command' })
  async create(
    @Body() dto: CreateOrderDto,
    @Headers(IDEMPOTENCY_HEADER) idempotencyKey?: string,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ) {
    const idempotencyToken = idempotencyKey ?? dto.idempotencyToken;
    if (!idempotencyToken) {
      throw new BadRequestException(
        'An Idempotency-Key header or idempotencyToken is required',
      );
    }

    return this.unwrap(
      await this.createOrderUseCase.execute({
        buyerId: dto.buyerId,
        buyerName: dto.buyerName,
        address: dto.address,
        card: dto.card,
        items: dto.items,
        idempotencyToken,
        correlationId,
      }),
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an order with its lines and total' })
  @ApiParam({ name: 'id', description: 'Order UUID' })
  @ApiResponse({ status: 404, description: 'Order not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const result = await this.getOrderUseCase.execute(id);
    if (!result.success) {
      throw this.mapErrorToHttpException(result.error);
    }
    return result.order;
  }

  @Post(':id/awaiting-validation')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Hand a submitted order to stock validation' })
  @ApiParam({ name: 'id', description: 'Order UUID' })
  @ApiHeader({ name: 'Idempotency-Key', required: false })
  async setAwaitingValidation(
    @Param('id', ParseUUIDPipe) id: string,
    @Headers(IDEMPOTENCY_HEADER) idempotencyToken?: string,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ) {
    return this.unwrap(
      await this.setAwaitingValidationUseCase.execute({
        orderId: id,
        idempotencyToken,
        correlationId,
      }),
    );
  }

  @Post(':id/stock-confirmation')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Record the stock verdict',
    description: 'Any rejected product cancels the order',
  })
  @ApiParam({ name: 'id', description: 'Order UUID' })
  @ApiHeader({ name: 'Idempotency-Key', required: false })
  async confirmStock(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ConfirmStockDto,
    @Headers(IDEMPOTENCY_HEADER) idempotencyToken?: string,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ) {
    return this.unwrap(
      await this.confirmStockUseCase.execute({
        orderId: id,
        rejectedProductIds: dto.rejectedProductIds,
        idempotencyToken,
        correlationId,
      }),
    );
  }

  @Post(':id/payment')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a stock-confirmed order as paid' })
  @ApiParam({ name: 'id', description: 'Order UUID' })
  @ApiHeader({ name: 'Idempotency-Key', required: false })
  @ApiResponse({ status: 409, description: 'Order is not STOCK_CONFIRMED' })
  async markPaid(
    @Param('id', ParseUUIDPipe) id: string,
    @Headers(IDEMPOTENCY_HEADER) idempotencyToken?: string,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ) {
    return this.unwrap(
      await this.markPaidUseCase.execute({ orderId: id, idempotencyToken, correlationId }),
    );
  }

  @Post(':id/shipment')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a paid order as shipped' })
  @ApiParam({ name: 'id', description: 'Order UUID' })
  @ApiHeader({ name: 'Idempotency-Key', required: false })
  async markShipped(
    @Param('id', ParseUUIDPipe) id: string,
    @Headers(IDEMPOTENCY_HEADER) idempotencyToken?: string,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ) {
    return this.unwrap(
      await this.markShippedUseCase.execute({ orderId: id, idempotencyToken, correlationId }),
    );
  }

  @Post(':id/cancellation')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel an order that has not been paid' })
  @ApiParam({ name: 'id', description: 'Order UUID' })
  @ApiHeader({ name: 'Idempotency-Key', required: false })
  async cancel(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CancelOrderDto,
    @Headers(IDEMPOTENCY_HEADER) idempotencyToken?: string,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ) {
    return this.unwrap(
      await this.cancelOrderUseCase.execute({
        orderId: id,
        reason: dto.reason,
        idempotencyToken,
        correlationId,
      }),
    );
  }

  private unwrap(result: OrderCommandResult) {
    if (!result.success) {
      throw this.mapErrorToHttpException(result.error);
    }
    return {
      orderId: result.orderId,
      status: result.status,
      replayed: result.replayed,
    };
  }

  private mapErrorToHttpException(error: OrderCommandError): HttpException {
    switch (error.code) {
      case 'VALIDATION_FAILED':
        return new BadRequestException(error);
      case 'ORDER_NOT_FOUND':
        return new NotFoundException(error);
      case 'INVALID_STATUS_TRANSITION':
      case 'CONCURRENCY_CONFLICT':
        return new ConflictException(error);
      case 'IDEMPOTENCY_TOKEN_REUSED':
        return new UnprocessableEntityException(error);
    }
  }
}
