import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam, ApiBody, ApiHeader } from '@nestjs/swagger';
import {
  FLUTTERWAVE_SIGNATURE_HEADER,
  MOLLIE_SIGNATURE_HEADER,
  MONNIFY_SIGNATURE_HEADER,
  PAYPAL_HEADERS,
  PAYSTACK_SIGNATURE_HEADER,
  SQUARE_SIGNATURE_HEADER,
} from '../../../adapters/drivers';
import { WebhookAcceptedDto, WebhookErrorDto } from '../../dto';

const PROVIDER_SIGNATURE_HEADERS: Array<{ name: string; description: string }> = [
  { name: PAYSTACK_SIGNATURE_HEADER, description: 'HMAC-SHA512 of the raw body (Paystack)' },
  { name: FLUTTERWAVE_SIGNATURE_HEADER, description: 'Shared secret hash (Flutterwave)' },
  { name: MONNIFY_SIGNATURE_HEADER, description: 'HMAC-SHA512 of the raw body (Monnify)' },
  { name: SQUARE_SIGNATURE_HEADER, description: 'HMAC-SHA256 of the raw body (Square)' },
  { name: PAYPAL_HEADERS.transmissionSig, description: 'Transmission signature (PayPal)' },
  { name: MOLLIE_SIGNATURE_HEADER, description: 'HMAC-SHA256 of the raw body (Mollie)' },
];

/**
 * Swagger decorator for the provider webhook endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive payment webhook',
      description:
        'Authenticates the delivery against the provider signature and replay window, then queues it for background processing.',
    }),
    ApiParam({
      name: 'provider',
      description: 'Configured provider name',
      example: 'paystack',
      required: true,
    }),
    ...PROVIDER_SIGNATURE_HEADERS.map((header) =>
      ApiHeader({ name: header.name, description: header.description, required: false }),
    ),
    ApiBody({
      description: 'Raw webhook payload from the payment provider',
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          event: 'charge.success',
          data: { reference: 'PAYSTACK_1700000000_ab12cd34ef56ab78', status: 'success', channel: 'card' },
        },
      },
    }),
    ApiResponse({ status: 202, description: 'Delivery queued, or test event acknowledged', type: WebhookAcceptedDto }),
    ApiResponse({ status: 400, description: 'Body is not a JSON object', type: WebhookErrorDto }),
    ApiResponse({ status: 401, description: 'Signature or timestamp rejected', type: WebhookErrorDto }),
    ApiResponse({ status: 404, description: 'Provider unknown or disabled', type: WebhookErrorDto }),
    ApiResponse({ status: 500, description: 'Delivery could not be queued' }),
  );
};
