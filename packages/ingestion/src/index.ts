export {
  createLoggingIngestionObserver,
  noOpIngestionObserver,
  type IngestionObserver,
  type RejectionReason,
} from './app/ports/ingestion-observer.js';
export { ObjectNotFoundError, type ObjectStorage, type StoredObject } from './app/ports/object-storage.js';
export {
  CNAB_FIELDS,
  parseCnabDate,
  parseCnabTime,
  parseLine,
  parseLines,
  toIsoDate,
} from './features/parsing/line-parser.js';
export {
  CNAB_LINE_LENGTH,
  MAX_FILE_SIZE_BYTES,
  StructuralValidator,
  type StructuralLimits,
  type StructuralSummary,
  type StructuralValidationOptions,
} from './features/validation/structural-validator.js';
export { InMemoryObjectStorage } from './infrastructure/storage/in-memory-object-storage.js';
export { StoreBalanceService, sumSignedAmounts, type StoreBalance } from './services/balance/store-balance-service.js';
export {
  IngestionOrchestrator,
  type IngestionEffects,
  type IngestionOrchestratorOptions,
  type IngestionOutcome,
  type IngestionRequest,
} from './services/ingestion-orchestrator.js';
export { SignLookup, toSign, type TransactionTypeSource } from './services/sign-lookup.js';
export { StoreResolver, type StoreResolution, type StoreStore } from './services/store-resolver.js';
