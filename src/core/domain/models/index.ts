export * from './webhook-event.model';
export * from './incoming-request.model';
