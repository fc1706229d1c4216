/**
 * In-process event dispatch for payment events
 */
export { EventDispatcherImpl } from './event-dispatcher.impl';
export * from './handlers/logging.handler';
