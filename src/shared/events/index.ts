export * from './integration-event';
export * from './message-transport.interface';
export * from './in-memory-message-transport';
export * from './idempotency.service';
