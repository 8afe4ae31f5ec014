/**
 * Picks the persistence backend at startup.
 *
 * MONGO_URL unset            → in-memory
 * MONGO_URL set, connect ok  → MongoDB (indexes ensured)
 * MONGO_URL set, connect err → in-memory, with a warning
 */

import { connectMongo } from '../../../db/mongoose.js';
import { ensureIndexes } from '../../../db/indexes.js';
import { errorMessage } from '../../../common/errors.js';
import { type Logger, noopLogger } from '../../../common/runtime.types.js';
import type { CityDataRepository } from '../contracts/history.types.js';
import { InMemoryCityRepository } from '../storage/memory.repository.js';
import { MongoCityRepository } from '../storage/mongo.repository.js';

export interface RepositorySettings {
  MONGO_URL?: string;
  MONGO_DB_NAME: string;
}

export interface RepositoryFactoryDeps {
  connect?: (url: string, dbName: string) => Promise<void>;
  prepare?: () => Promise<void>;
  logger?: Logger;
}

export async function createCityRepository(
  settings: RepositorySettings,
  deps: RepositoryFactoryDeps = {},
): Promise<CityDataRepository> {
  const logger = deps.logger ?? noopLogger;
  const connect = deps.connect ?? ((url, dbName) => connectMongo(url, { dbName }));
  const prepare = deps.prepare ?? ensureIndexes;

  if (!settings.MONGO_URL) {
    logger.info({ backend: 'memory' }, 'MONGO_URL not set, history kept in memory');
    return new InMemoryCityRepository();
  }

  try {
    await connect(settings.MONGO_URL, settings.MONGO_DB_NAME);
    await prepare();
    logger.info({ backend: 'mongo', db: settings.MONGO_DB_NAME }, 'History store connected');
    return new MongoCityRepository();
  } catch (err) {
    logger.warn(
      { backend: 'memory', err: errorMessage(err) },
      'MongoDB unreachable, falling back to in-memory history',
    );
    return new InMemoryCityRepository();
  }
}
