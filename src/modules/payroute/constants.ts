/**
 * Injection tokens for the payments module
 */

export const PAYROUTE_MODULE_OPTIONS = Symbol('PAYROUTE_MODULE_OPTIONS');
export const PAYROUTE_CONFIG = Symbol('PAYROUTE_CONFIG');
export const TRANSACTION_STORE = Symbol('TRANSACTION_STORE');
export const SESSION_CACHE = Symbol('SESSION_CACHE');
export const HEALTH_CACHE = Symbol('HEALTH_CACHE');
export const DRIVER_FACTORY = Symbol('DRIVER_FACTORY');
export const STATUS_NORMALIZER = Symbol('STATUS_NORMALIZER');
export const CHANNEL_MAPPER = Symbol('CHANNEL_MAPPER');
export const PROVIDER_DETECTOR = Symbol('PROVIDER_DETECTOR');
export const PAYMENT_ORCHESTRATOR = Symbol('PAYMENT_ORCHESTRATOR');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
export const WEBHOOK_QUEUE = Symbol('WEBHOOK_QUEUE');

export const DEFAULT_WEBHOOK_PATH = 'payments/webhook';
export const DEFAULT_HEALTH_PATH = 'payments/health';
