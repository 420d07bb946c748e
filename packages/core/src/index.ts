// Shared
export { generateId, ok, err } from './shared/types.js';
export type { Result } from './shared/types.js';
export {
  ProcurementError,
  ValidationError,
  PermissionDeniedError,
  InvalidStateError,
  AlreadyDecidedError,
  EntityNotFoundError,
  DuplicatePurchaseOrderError,
  PurchaseOrderGenerationError,
  ConcurrencyConflictError,
  AuthenticationError,
  isProcurementError,
} from './shared/errors.js';
export type { ErrorCode, Precondition } from './shared/errors.js';
export { createPool, runMigrations, withTransaction } from './shared/database.js';
export type { DatabaseConfig } from './shared/database.js';
export { createLogger, setLogLevel } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
export { toCents, fromCents, lineTotal, sumLines } from './shared/money.js';

// Domain
export { ROLES, REQUEST_STATUSES } from './domain/types.js';
export type {
  Role,
  RequestStatus,
  ApprovalLevel,
  Decision,
  UserProfile,
  RequestItemInput,
  RequestItem,
  ProformaMetadata,
  RequestSource,
  PurchaseRequest,
  Approval,
  PurchaseOrderLine,
  PurchaseOrder,
  ReceiptLine,
  DiscrepancyKind,
  Discrepancy,
  ReceiptValidationResult,
  RequestView,
} from './domain/types.js';
export {
  TRANSITIONS,
  transition,
  isTerminal,
  isRole,
  isRequestStatus,
  parseRequestStatus,
  parseApprovalLevel,
  parseDecision,
} from './domain/status.js';

// Role Authority
export { ACTIONS, authorize, requireAuthorization, requireActionRole } from './role-authority/role-authority.js';
export type { Action, AuthorizationDecision, AuthorizationSubject } from './role-authority/role-authority.js';

// Identity
export { InMemoryIdentityResolver, PgIdentityResolver, resolveProfile } from './identity/identity-resolver.js';
export type { IdentityResolver } from './identity/identity-resolver.js';

// Store
export { InMemoryProcurementStore } from './store/memory-store.js';
export { PgProcurementStore } from './store/pg-store.js';
export { KeyedLock } from './store/keyed-lock.js';
export type { ProcurementStore, RequestTransaction, RequestFilter, StatusChange } from './store/types.js';

// Request Ledger
export { RequestLedger } from './request-ledger/request-ledger.service.js';
export type { RequestDraft, RequestLedgerOptions } from './request-ledger/request-ledger.service.js';
export { validateItems } from './request-ledger/item-validation.js';

// Approval Engine
export { ApprovalEngine, COMMENT_MAX_LENGTH } from './approval-engine/approval-engine.service.js';
export type { DecisionInput, DecisionOutcome } from './approval-engine/approval-engine.service.js';

// PO Generator
export {
  PurchaseOrderGenerator,
  DEFAULT_PO_GENERATION_TIMEOUT_MS,
} from './po-generator/po-generator.service.js';
export type {
  PurchaseOrderDocumentRenderer,
  PurchaseOrderGeneratorOptions,
} from './po-generator/po-generator.service.js';
export { formatPoNumber, DEFAULT_PO_PREFIX } from './po-generator/po-number.js';

// Receipt Validator
export { ReceiptValidator, parseReceiptLines, EXACT_MATCH } from './receipt-validator/receipt-validator.js';
export type { ReceiptTolerance } from './receipt-validator/receipt-validator.js';

// Proforma extraction
export { assertSupportedDocument, parseExtractedProforma } from './extraction/proforma.js';
export type { ProformaDocument, DocumentExtractionService, ExtractedProforma } from './extraction/proforma.js';

// Rules Engine
export {
  evaluate,
  isActiveOn,
  evaluateCondition,
  loadRulesFromFile,
  loadRulesFromDirectory,
  REQUEST_POLICY_RULES,
  TITLE_MAX_LENGTH,
} from './rules-engine/index.js';
export type {
  Rule,
  Condition,
  ConditionOperator,
  RuleOperation,
  RuleAction,
  RuleContext,
  EvaluationResult,
  EvaluationTrace,
} from './rules-engine/index.js';

// Observability
export { SPANS, traced, tracedSync } from './observability/index.js';
export type { SpanName } from './observability/index.js';

// Service
export { ProcurementService } from './procurement.service.js';
export type { ProcurementServiceOptions, ProformaImport, ServiceResult } from './procurement.service.js';
