export { MongoAtomicScope, createMongoRepositories } from './atomic-scope';
export { MongoAccountRepository } from './account.repository';
export { MongoLedgerRepository } from './ledger.repository';
export { MongoCodeRepository } from './code.repository';
export { isDuplicateKeyError } from './errors';
