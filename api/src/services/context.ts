import type { Logger } from '../logger';
import type { GradingStore } from '../store/types';
import type { ImportLockRegistry } from './importLock';

export interface ServiceContext {
  store: GradingStore;
  logger: Logger;
  locks: ImportLockRegistry;
}
