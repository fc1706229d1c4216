import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ProviderHealthDto {
  @ApiProperty({ description: 'Result of the cached provider health check', example: true })
  healthy!: boolean;

  @ApiPropertyOptional({
    description: 'Currencies accepted by the provider',
    example: ['NGN', 'USD'],
    type: [String],
  })
  currencies?: string[];

  @ApiPropertyOptional({
    description: 'Why the provider could not be checked',
    example: 'paystack configuration is missing required setting "secretKey"',
  })
  error?: string;
}

/**
 * Health report for every enabled provider
 */
export class HealthResponseDto {
  @ApiProperty({ example: 'operational' })
  status!: 'operational';

  @ApiProperty({
    description: 'Keyed by provider name',
    type: 'object',
    additionalProperties: { $ref: '#/components/schemas/ProviderHealthDto' },
    example: {
      paystack: { healthy: true, currencies: ['NGN', 'GHS', 'ZAR', 'USD'] },
      flutterwave: { healthy: false, currencies: ['NGN'] },
    },
  })
  providers!: Record<string, ProviderHealthDto>;
}
