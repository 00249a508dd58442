/**
 * Schema validation exports
 */

export * from './args.schema';
export * from './config.schema';
export * from './validation';
