export * from './http-client';
export * from './payload';
export * from './signatures';
export * from './driver-toolkit';
