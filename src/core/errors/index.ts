export * from './ErrorContext';
export * from './OrchestrationError';
export * from './errors';
export * from './errorFactory';
