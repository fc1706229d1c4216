import { Controller, Get, HttpCode, HttpStatus, Inject, Type } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { PaymentOrchestrator } from '../../../core';
import { ApiHealthCheck } from '../../../_shared/swagger/decorators';
import { HealthResponseDto } from '../../../_shared/dto';
import { DEFAULT_HEALTH_PATH, PAYMENT_ORCHESTRATOR } from '../constants';

/**
 * Provider health controller mounted at the configured path
 */
export function createHealthController(path: string = DEFAULT_HEALTH_PATH): Type<unknown> {
  @ApiTags('Health')
  @Controller(path)
  class HealthController {
    constructor(
      @Inject(PAYMENT_ORCHESTRATOR)
      private readonly orchestrator: PaymentOrchestrator,
    ) {}

    @Get()
    @HttpCode(HttpStatus.OK)
    @ApiHealthCheck()
    async health(): Promise<HealthResponseDto> {
      return {
        status: 'operational',
        providers: await this.orchestrator.checkHealth(),
      };
    }
  }

  return HealthController;
}
