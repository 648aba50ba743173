// apps/client/src/index.ts

export * from "./app/config/env";
export * from "./app/lib/errors";
export * from "./app/lib/logger";
export * from "./app/lib/localDate";
export * from "./app/lib/withTimeout";
export * from "./app/api/http";
export * from "./app/api/financeApi";
export * from "./app/cache/asyncLock";
export * from "./app/cache/cacheKeys";
export * from "./app/cache/cacheStorage";
export * from "./app/cache/persistentCache";
export * from "./app/store/syncStore";
export * from "./app/sync/syncScheduler";
export * from "./app/services/budgetEngine";
export * from "./app/services/createBudgetEngine";
