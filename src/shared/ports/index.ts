export * from './notification.port';
