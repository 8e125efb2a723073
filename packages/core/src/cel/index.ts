export * from './expression-engine';
export * from './evaluator';
