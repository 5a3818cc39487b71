/**
 * Type barrel — re-exports all public types from @tally/node.
 */

// DTOs
export {
  IdentitySchema,
  DateTimeSchema,
  RecordIdSchema,
  SplitModeSchema,
  ParticipantSchema,
  CreateExpenseSchema,
  CreateSettlementSchema,
  CreateGroupSchema,
  ActivityQuerySchema,
  BalancesQuerySchema,
  VerifyQuerySchema,
} from "./dto.js";
export type {
  CreateExpenseDto,
  CreateSettlementDto,
  CreateGroupDto,
  ActivityQuery,
  BalancesQuery,
  VerifyQuery,
} from "./dto.js";

// Error
export { CLIENT_ERROR_STATUS, createErrorEnvelope, isClientErrorCode } from "./error.js";
export type {
  ApiErrorCode,
  ClientErrorCode,
  DomainErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
