export * from './charge-request.model';
export * from './charge-response.model';
export * from './verification-response.model';
export * from './verification-context.model';
