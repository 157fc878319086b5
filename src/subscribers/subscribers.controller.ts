import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { SubscribersService } from './subscribers.service.js';
import {
  CreateSubscriberBodySchema,
  ListSubscribersQuerySchema,
  UpdateSubscriberBodySchema,
  type CreateSubscriberBody,
  type ListSubscribersQuery,
  type UpdateSubscriberBody,
} from './dto/subscriber.dto.js';

@Controller('v1/subscribers')
@UseGuards(AuthGuard)
export class SubscribersController {
  constructor(private readonly subscribersService: SubscribersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Body(new ZodValidationPipe(CreateSubscriberBodySchema))
    body: CreateSubscriberBody,
  ) {
    return this.subscribersService.create(body);
  }

  @Get()
  async list(
    @Query(new ZodValidationPipe(ListSubscribersQuerySchema))
    query: ListSubscribersQuery,
  ) {
    return this.subscribersService.list(query);
  }

  @Get(':id')
  async get(@Param('id', ParseUUIDPipe) id: string) {
    return this.subscribersService.get(id);
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body(new ZodValidationPipe(UpdateSubscriberBodySchema))
    body: UpdateSubscriberBody,
  ) {
    return this.subscribersService.update(id, body);
  }
}
