import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for an authenticated, queued webhook delivery
 */
export class WebhookAcceptedDto {
  @ApiProperty({
    description: 'queued: handed to the worker; ignored: an authenticated test event',
    example: 'queued',
    enum: ['queued', 'ignored'],
  })
  status!: 'queued' | 'ignored';
}

export class WebhookErrorDto {
  @ApiProperty({ example: 401 })
  statusCode!: number;

  @ApiProperty({ example: 'Invalid paystack webhook signature' })
  message!: string;
}
