export * from './webhook.controller';
export * from './health.controller';
