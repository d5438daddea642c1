export * from './types';
export {
  InMemoryImportBatchRepository,
  InMemoryImportPatternRepository,
  InMemoryMatchRepository,
  InMemoryRecurringInstanceSource,
  InMemoryTransactionRepository,
  createInMemoryRepositories,
} from './memory';
