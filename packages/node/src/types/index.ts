/**
 * Type barrel — re-exports all public types from @afterword/node.
 */

export * from "./dto.js";

export { createErrorEnvelope, notFound } from "./error.js";
export type { ApiErrorCode, DomainErrorCode, ErrorCode, ErrorEnvelope } from "./error.js";

export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";

export type { AuthContext, ApiKeyRecord } from "./auth.js";

export type { AppEnv } from "./api-contract.js";

export { toExecutionStateView, toFundedProjectView, decisionStatus } from "./views.js";
export type { ExecutionStateView, FundedProjectView } from "./views.js";
