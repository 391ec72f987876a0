import type { StorageConfig } from '../shared/types.js';
import { createCsvStorage } from './csvStorage.js';
import { createJsonStorage } from './jsonStorage.js';
import type { MovieStorage } from './storage.js';

export type { MovieStorage, CollectionCodec } from './storage.js';
export { FileStorage } from './storage.js';
export { createJsonStorage, jsonCodec } from './jsonStorage.js';
export { createCsvStorage, csvCodec } from './csvStorage.js';

export function createStorage(config: StorageConfig): MovieStorage {
  switch (config.format) {
    case 'json':
      return createJsonStorage(config.path);
    case 'csv':
      return createCsvStorage(config.path);
  }
}
