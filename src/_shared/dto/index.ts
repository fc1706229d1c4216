export * from './webhook.dto';
export * from './health.dto';
