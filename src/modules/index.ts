export * from './webhook-relay';
