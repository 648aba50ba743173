// packages/planner/src/index.ts

export * from "./lib/money";
export * from "./lib/income/thresholdTable";
export * from "./lib/income/incomeClassifier";
export * from "./lib/income/tierWeights";
export * from "./lib/plan/defaults";
export * from "./lib/plan/monthUtils";
export * from "./lib/plan/budgetAllocator";
export * from "./lib/plan/calendarGenerator";
export * from "./lib/plan/planProgress";
export * from "./lib/plan/fallbackPlan";
export * from "./lib/plan/consistencyGuard";
