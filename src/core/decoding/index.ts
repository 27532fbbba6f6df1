export * from './payload-decoder';
