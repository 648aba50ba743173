// packages/shared/src/index.ts

export * from "./money/types";
export * from "./income/types";
export * from "./plans/categories";
export * from "./plans/types";
export * from "./user/types";
export * from "./dashboard/types";
