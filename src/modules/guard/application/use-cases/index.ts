export * from './process-candidate.use-case';
