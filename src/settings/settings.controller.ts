// 디스패치 설정 API — 재시도/속도 제한을 런타임에 조정

import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { BadRequestError } from '../common/errors/beacon-errors.js';
import { DispatchConfigService } from './dispatch-config.service.js';
import {
  PatchDispatchSettingsBodySchema,
  type PatchDispatchSettingsBody,
} from './dto/patch-dispatch-settings.dto.js';

@Controller('v1/settings/dispatch')
@UseGuards(AuthGuard)
export class SettingsController {
  constructor(private readonly configService: DispatchConfigService) {}

  @Get()
  getSettings() {
    return this.configService.getPublic();
  }

  @Patch()
  updateSettings(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(PatchDispatchSettingsBodySchema))
    body: PatchDispatchSettingsBody,
  ) {
    const current = this.configService.get().retry;
    const base = body.retry?.backoffBaseMs ?? current.backoffBaseMs;
    const cap = body.retry?.backoffCapMs ?? current.backoffCapMs;
    if (cap < base) {
      throw new BadRequestError('backoffCapMs must be >= backoffBaseMs', {
        backoffBaseMs: base,
        backoffCapMs: cap,
      });
    }

    this.configService.update(body);

    return {
      message: `Dispatch settings updated by ${userId || 'unknown'}. Changes apply to the next dispatch cycle.`,
      ...this.configService.getPublic(),
    };
  }
}
