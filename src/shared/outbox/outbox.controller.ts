import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpStatus,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { ArrayMaxSize, IsArray, IsOptional, IsUUID } from 'class-validator';
import { OutboxRelay } from './outbox.relay';

export class RequeueExhaustedDto {
  @ApiPropertyOptional({
    type: [String],
    description: 'Event ids to requeue; omit to requeue every exhausted event',
  })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(1000)
  @IsUUID('4', { each: true })
  ids?: string[];
}

@ApiTags('outbox')
@Controller('outbox')
export class OutboxController {
  constructor(private readonly relay: OutboxRelay) {}

  @Get('stats')
  @ApiOperation({ summary: 'Count outbox events per delivery state' })
  getStats() {
    return this.relay.getStats();
  }

  @Get('failed')
  @ApiOperation({ summary: 'List events that exhausted their retries' })
  @ApiQuery({ name: 'limit', required: false, example: 100 })
  getExhausted(
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ) {
    return this.relay.getExhaustedEvents(Math.min(Math.max(limit, 1), 1000));
  }

  @Post('failed/requeue')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Give exhausted events a fresh retry budget' })
  @ApiResponse({ status: 200, description: 'Number of requeued events' })
  async requeue(@Body() dto: RequeueExhaustedDto) {
    const requeued = await this.relay.requeueExhausted(dto.ids);
    return { requeued };
  }
}
