import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  Param,
  Post,
  RawBodyRequest,
  Req,
  Type,
  UnauthorizedException,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request } from 'express';
import {
  DriverNotFoundError,
  PaymentDriver,
  PaymentOrchestrator,
  WebhookAuthError,
  WebhookQueue,
  errorMessage,
} from '../../../core';
import { parseJsonObject } from '../../../adapters/drivers';
import { ApiWebhookEndpoint } from '../../../_shared/swagger/decorators';
import { WebhookAcceptedDto } from '../../../_shared/dto';
import { DEFAULT_WEBHOOK_PATH, PAYMENT_ORCHESTRATOR, WEBHOOK_QUEUE } from '../constants';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';

export const QUEUE_FAILURE_MESSAGE = 'Webhook received but queuing failed internally';

/**
 * Webhook controller mounted at the configured path.
 * Authenticates deliveries synchronously and leaves processing to the queue.
 */
export function createWebhookController(path: string = DEFAULT_WEBHOOK_PATH): Type<unknown> {
  @ApiTags('Webhooks')
  @Controller(path)
  class WebhookController {
    private readonly logger = new Logger('WebhookController');

    constructor(
      @Inject(PAYMENT_ORCHESTRATOR)
      private readonly orchestrator: PaymentOrchestrator,
      @Inject(WEBHOOK_QUEUE)
      private readonly queue: WebhookQueue,
    ) {}

    @Post(':provider')
    @HttpCode(HttpStatus.ACCEPTED)
    @UseInterceptors(RawBodyInterceptor)
    @ApiWebhookEndpoint()
    async handleWebhook(
      @Param('provider') provider: string,
      @Req() request: RawBodyRequest<Request>,
    ): Promise<WebhookAcceptedDto> {
      const rawBody = request.rawBody ?? Buffer.alloc(0);

      let driver: PaymentDriver;
      try {
        driver = this.orchestrator.driver(provider);
        await this.authenticate(driver, request, rawBody);
      } catch (error) {
        throw this.toHttpException(error);
      }

      const payload = parseJsonObject(rawBody);
      if (!payload) {
        throw new BadRequestException('Webhook body must be a JSON object');
      }

      if (driver.isActionableWebhook && !driver.isActionableWebhook(payload)) {
        this.logger.log(`Acknowledged ${provider} test webhook`);
        return { status: 'ignored' };
      }

      try {
        await this.queue.enqueue({ provider, payload });
      } catch (error) {
        this.logger.error(`Failed to queue ${provider} webhook: ${errorMessage(error)}`);
        throw new InternalServerErrorException({ message: QUEUE_FAILURE_MESSAGE });
      }

      this.logger.log(`Queued ${provider} webhook`);
      return { status: 'queued' };
    }

    private async authenticate(driver: PaymentDriver, request: Request, rawBody: Buffer): Promise<void> {
      if (!(await driver.validateWebhook(request.headers, rawBody))) {
        throw new WebhookAuthError(`Invalid ${driver.name} webhook signature`, driver.name);
      }
    }

    private toHttpException(error: unknown): unknown {
      if (error instanceof DriverNotFoundError) {
        return new NotFoundException(error.message);
      }
      if (error instanceof WebhookAuthError) {
        this.logger.warn(error.message);
        return new UnauthorizedException(error.message);
      }
      return error;
    }
  }

  return WebhookController;
}
