/**
 * orcabase-client: typed client for the change-instance lifecycle of a
 * change-management service, plus the batch workflow automation tooling
 * runs after a deployment.
 *
 * The four operations below are the entry points for automation: each takes
 * raw parameters, validates them, authenticates at most once, calls the
 * core and returns a result object. Failures come back as typed results
 * with an error code; only unexpected programming errors are thrown.
 *
 * Pipeline of every operation:
 * validate params → resolve credential → token → core call → result
 */

import type { ZodIssue, z } from 'zod';
import { resolveToken } from './auth/auth-client.js';
import { resolveCredential } from './auth/credential.js';
import { listChangeInstances } from './changes/change-instance-repository.js';
import {
  buildUpdateDocument,
  updateChangeInstance,
  type UpdateDocument,
} from './changes/change-instance-updater.js';
import { completeApprovedChanges } from './changes/completion-workflow.js';
import { OrcaErrorCode, isOrcaError } from './errors.js';
import type { ApiContext } from './http/api-request.js';
import { createFetchHttpClient, type HttpClient } from './http/http-client.js';
import { silentLogger, type Logger } from './logging/logger.js';
import {
  CompleteChangesParams,
  GetChangesParams,
  GetServiceItemsParams,
  UpdateChangeParams,
  type ConnectionParams,
} from './schemas/input.schema.js';
import type {
  ChangeInstance,
  CompletionReport,
  ServiceItem,
  UpdateResponse,
} from './schemas/output.schema.js';
import { listServiceItems } from './service-items/service-item-repository.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '0.2.0';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface OperationOptions {
  /** Raw parameters, validated against the operation's schema */
  params: unknown;
  /** Default: fetch-backed client */
  http?: HttpClient;
  /** Default: silentLogger */
  logger?: Logger;
}

export const PARTIAL_COMPLETION = 'PARTIAL_COMPLETION';

export interface OperationFailure {
  success: false;
  code: OrcaErrorCode;
  error: string;
  /** Present for VALIDATION_FAILED */
  issues?: ZodIssue[];
}

export interface GetChangesSuccess {
  success: true;
  changed: false;
  message: string;
  changeInstances: ChangeInstance[];
}

export interface GetServiceItemsSuccess {
  success: true;
  changed: false;
  message: string;
  serviceItems: ServiceItem[];
}

export interface UpdateChangeSuccess {
  success: true;
  changed: true;
  message: string;
  /** Server representation after the update; null on a dry run */
  changeInstance: UpdateResponse | null;
  /** Document that was (or on a dry run would have been) sent */
  document: UpdateDocument;
}

export interface CompleteChangesSuccess {
  success: true;
  changed: boolean;
  message: string;
  report: CompletionReport;
}

/** Some updates may have been applied before the run stopped */
export interface CompleteChangesPartial {
  success: false;
  code: typeof PARTIAL_COMPLETION;
  error: string;
  report: CompletionReport;
}

export type GetChangesResult = GetChangesSuccess | OperationFailure;
export type GetServiceItemsResult = GetServiceItemsSuccess | OperationFailure;
export type UpdateChangeResult = UpdateChangeSuccess | OperationFailure;
export type CompleteChangesResult =
  | CompleteChangesSuccess
  | CompleteChangesPartial
  | OperationFailure;

// ---------------------------------------------------------------------------
// Re-exports for consumer convenience
// ---------------------------------------------------------------------------

export type { ApiContext } from './http/api-request.js';
export type { HttpClient, HttpRequest, HttpResponse } from './http/http-client.js';
export type { Logger, LogLevel } from './logging/logger.js';
export type { Credential } from './auth/credential.js';
export type { ChangeInstanceFields, UpdateDocument } from './changes/change-instance-updater.js';
export type { ChangeInstanceQuery } from './changes/change-instance-repository.js';
export type { ChangeState } from './schemas/input.schema.js';
export type {
  ChangeInstance,
  CompletionOutcome,
  CompletionReport,
  ServiceItem,
} from './schemas/output.schema.js';
export {
  OrcaError,
  OrcaErrorCode,
  ValidationError,
  AuthenticationError,
  NetworkError,
  ServerError,
} from './errors.js';
export { createFetchHttpClient } from './http/http-client.js';
export { createConsoleLogger, silentLogger } from './logging/logger.js';
export { loadConfig } from './config/config.js';
export { login, resolveToken } from './auth/auth-client.js';
export { resolveCredential } from './auth/credential.js';
export { listChangeInstances, filterByService } from './changes/change-instance-repository.js';
export { listServiceItems } from './service-items/service-item-repository.js';
export { buildUpdateDocument, updateChangeInstance } from './changes/change-instance-updater.js';
export { completeApprovedChanges } from './changes/completion-workflow.js';

// ---------------------------------------------------------------------------
// Shared operation runner
// ---------------------------------------------------------------------------

interface Session {
  ctx: ApiContext;
  token: string;
}

/**
 * Validate → authenticate → run. Any OrcaError becomes an OperationFailure;
 * other exceptions propagate.
 */
async function runOperation<P extends ConnectionParams, R>(
  name: string,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  options: OperationOptions,
  run: (session: Session, params: P) => Promise<R>,
): Promise<R | OperationFailure> {
  const logger = (options.logger ?? silentLogger).child({ operation: name });

  // -------------------------------------------------------------------------
  // Step 1: Validate params (no I/O on failure)
  // -------------------------------------------------------------------------
  const parsed = schema.safeParse(options.params);
  if (!parsed.success) {
    const error = `Parameter validation failed: ${parsed.error.errors.map((e) => e.message).join(', ')}`;
    logger.error(error);
    return {
      success: false,
      code: OrcaErrorCode.VALIDATION_FAILED,
      error,
      issues: parsed.error.errors,
    };
  }
  const params = parsed.data;

  const ctx: ApiContext = {
    baseUrl: params.url,
    http: options.http ?? createFetchHttpClient(),
    logger,
  };

  try {
    // -----------------------------------------------------------------------
    // Step 2: Credential → token (one login at most)
    // -----------------------------------------------------------------------
    const token = await resolveToken(ctx, resolveCredential(params));

    // -----------------------------------------------------------------------
    // Step 3: Core call
    // -----------------------------------------------------------------------
    return await run({ ctx, token }, params);
  } catch (err) {
    if (!isOrcaError(err)) throw err;
    logger.error('Operation failed', { code: err.code, error: err });
    return { success: false, code: err.code, error: err.message };
  }
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * List change instances in `state` (default APPROVED), optionally narrowed
 * to one service.
 */
export async function getChanges(options: OperationOptions): Promise<GetChangesResult> {
  return runOperation('getChanges', GetChangesParams, options, async ({ ctx, token }, params): Promise<GetChangesSuccess> => {
    const changeInstances = await listChangeInstances(ctx, token, {
      state: params.state,
      serviceName: params.serviceName,
    });
    return {
      success: true,
      changed: false,
      message: `Found ${changeInstances.length} change items`,
      changeInstances,
    };
  });
}

/**
 * List the service items that belong to `serviceName`.
 */
export async function getServiceItems(
  options: OperationOptions,
): Promise<GetServiceItemsResult> {
  return runOperation(
    'getServiceItems',
    GetServiceItemsParams,
    options,
    async ({ ctx, token }, params): Promise<GetServiceItemsSuccess> => {
      const serviceItems = await listServiceItems(ctx, token, params.serviceName);
      return {
        success: true,
        changed: false,
        message: `Found ${serviceItems.length} service items`,
        serviceItems,
      };
    },
  );
}

/**
 * Move one change instance to `state`, optionally attaching a deployed item.
 */
export async function updateChange(options: OperationOptions): Promise<UpdateChangeResult> {
  return runOperation('updateChange', UpdateChangeParams, options, async ({ ctx, token }, params): Promise<UpdateChangeSuccess> => {
    const fields = {
      state: params.state,
      deployedItem: params.deployedItem,
      description: params.description,
    };

    if (params.dryRun) {
      return {
        success: true,
        changed: true,
        message: `Would update ${params.uuid} change item`,
        changeInstance: null,
        document: buildUpdateDocument(fields),
      };
    }

    const changeInstance = await updateChangeInstance(ctx, token, params.uuid, fields);
    return {
      success: true,
      changed: true,
      message: `Updated ${params.uuid} change item`,
      changeInstance,
      document: buildUpdateDocument(fields),
    };
  });
}

/**
 * Complete every APPROVED change instance of `serviceName`, attaching the
 * same `deployedItem` to each.
 */
export async function completeChanges(
  options: OperationOptions,
): Promise<CompleteChangesResult> {
  return runOperation(
    'completeChanges',
    CompleteChangesParams,
    options,
    async ({ ctx, token }, params): Promise<CompleteChangesResult> => {
      const report = await completeApprovedChanges(
        ctx,
        token,
        params.serviceName,
        params.deployedItem,
        { dryRun: params.dryRun },
      );

      if (!report.successful) {
        return {
          success: false,
          code: PARTIAL_COMPLETION,
          error: report.message,
          report,
        };
      }
      return {
        success: true,
        changed: params.dryRun ? report.outcomes.length > 0 : report.count > 0,
        message: report.message,
        report,
      };
    },
  );
}
