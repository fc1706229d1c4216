export * from './payment-status.enum';
export * from './payment-channel.enum';
export * from './payment-event.enum';
