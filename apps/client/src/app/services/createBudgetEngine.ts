// apps/client/src/app/services/createBudgetEngine.ts

import { createHttpFinanceApi, type FinanceApi } from "../api/financeApi";
import { SqliteCacheStorage, type CacheStorage } from "../cache/cacheStorage";
import { PersistentCache } from "../cache/persistentCache";
import { loadEngineConfig, type EngineConfig } from "../config/env";
import { defaultLogger, type Logger } from "../lib/logger";
import { BudgetEngine } from "./budgetEngine";

export type CreateBudgetEngineOptions = {
  config?: EngineConfig;
  api?: FinanceApi;
  storage?: CacheStorage;
  logger?: Logger;
  now?: () => number;
};

/** Wire one engine instance from config (defaults: process.env). */
export function createBudgetEngine(opts: CreateBudgetEngineOptions = {}): BudgetEngine {
  const config = opts.config ?? loadEngineConfig();
  const logger = opts.logger ?? defaultLogger;

  const cache = new PersistentCache({
    storage: opts.storage ?? new SqliteCacheStorage(config.cachePath),
    logger,
    now: opts.now,
  });
  const api = opts.api ?? createHttpFinanceApi({ baseUrl: config.apiBaseUrl, logger });

  return new BudgetEngine({ cache, api, config, logger, now: opts.now });
}
