export * from './result';
export * from './target';
