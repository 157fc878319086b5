import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { AlertsService } from './alerts.service.js';

@Controller('v1/alerts')
@UseGuards(AuthGuard)
export class AlertsController {
  private readonly logger = new Logger(AlertsController.name);

  constructor(private readonly alertsService: AlertsService) {}

  // 본문 검증은 intake 가 담당 (422 INVALID_REPORT)
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async report(@UserId() userId: string, @Body() body: unknown) {
    const result = await this.alertsService.report(body);
    this.logger.log(`Report from ${userId || 'unknown'}: ${result.alertId} ${result.status}`);
    return result;
  }

  @Get(':alertId')
  async getAlert(@Param('alertId', ParseUUIDPipe) alertId: string) {
    return this.alertsService.getAlert(alertId);
  }

  @Get(':alertId/deliveries')
  async getDeliveries(@Param('alertId', ParseUUIDPipe) alertId: string) {
    return this.alertsService.getDeliveryStatus(alertId);
  }

  @Post(':alertId/withdraw')
  @HttpCode(HttpStatus.OK)
  async withdraw(
    @UserId() userId: string,
    @Param('alertId', ParseUUIDPipe) alertId: string,
  ) {
    this.logger.log(`Withdrawal of ${alertId} requested by ${userId || 'unknown'}`);
    return this.alertsService.withdraw(alertId);
  }

  @Post(':alertId/resolve')
  @HttpCode(HttpStatus.OK)
  async resolve(@Param('alertId', ParseUUIDPipe) alertId: string) {
    return this.alertsService.retryResolve(alertId);
  }
}
