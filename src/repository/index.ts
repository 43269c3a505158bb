export { initializeDatabase, closeDatabase } from './database.js';
export { SqliteLearningStore, type ILearningStore } from './learning-store.js';
export { RunRepository, type IRunRepository, type StoredAuditEntry } from './run-repository.js';
