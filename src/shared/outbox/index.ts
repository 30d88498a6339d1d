export * from './outbox.store';
export * from './outbox.rules';
export * from './drizzle-outbox.writer';
export * from './drizzle-outbox.store';
export * from './outbox.relay';
export * from './outbox.module';
