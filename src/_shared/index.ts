/**
 * Shared DTOs, Swagger decorators and testing helpers
 */

export * from './dto';

export * from './swagger';

export * from './testing/signed-webhook-factory';
