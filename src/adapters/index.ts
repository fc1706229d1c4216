export * from './cache';
export * from './drivers';
export * from './storage';
