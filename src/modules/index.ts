/**
 * NestJS integration
 */

export * from './payroute';
