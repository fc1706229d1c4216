export * from './payroute.module';
export * from './payroute.config';
export * from './constants';
export * from './controllers';
export * from './interceptors/raw-body.interceptor';
export * from './services';
