// Interface and type exports
export * from './credentials.interface';
export * from './event-dispatcher.interface';
export * from './configuration.interface';
