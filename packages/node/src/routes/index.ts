/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createExpenseRoutes, toExpense } from "./expenses.js";
export { createSettlementRoutes, toSettlement } from "./settlements.js";
export { createGroupRoutes } from "./groups.js";
export { createBalanceRoutes } from "./balances.js";
export { createActivityRoutes } from "./activity.js";
export { createLedgerRoutes } from "./ledger.js";
