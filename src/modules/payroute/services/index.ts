export * from './configuration.service';
export * from './payments.service';
export * from './webhook-worker.service';
