/**
 * Type barrel — re-exports all public types from @ledgerview/node.
 */

// DTOs
export {
  StatementQuerySchema,
  OutstandingQuerySchema,
  PartiesQuerySchema,
} from "./dto.js";
export type { StatementQuery, OutstandingQuery, PartiesQuery } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, DataEnvelope } from "./api-contract.js";
