export * from './incoming-message.adapter';
