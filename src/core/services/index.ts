export * from './credentials.service';
