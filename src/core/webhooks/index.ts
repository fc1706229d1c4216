export * from './replay-guard';
export * from './webhook-queue';
export * from './webhook-processor';
