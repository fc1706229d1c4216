import { applyDecorators } from '@nestjs/common';
import { ApiExtraModels, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HealthResponseDto, ProviderHealthDto } from '../../dto';

/**
 * Swagger decorator for the provider health endpoint
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiExtraModels(ProviderHealthDto),
    ApiOperation({
      summary: 'Provider health',
      description: 'Cached health check and supported currencies of every enabled provider.',
    }),
    ApiResponse({ status: 200, description: 'Health report', type: HealthResponseDto }),
  );
};
