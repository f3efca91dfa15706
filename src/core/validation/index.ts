export * from './orderValidator';
