export * from './keyed-mutex';
export * from './mock';
export * from './typeorm';
