export * from './status-normalizer';
export * from './channel-mapper';
export * from './provider-detector';
export * from './driver-factory';
