export { KnowledgeAggregator, collectKnowledgeItems, countByCategory } from './KnowledgeAggregator';
export type { AggregateOptions } from './KnowledgeAggregator';
export { inferCategory, inferType } from './KnowledgeClassifier';
export * from './types';
