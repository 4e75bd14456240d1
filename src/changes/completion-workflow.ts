/**
 * Completion workflow: marks every APPROVED change instance of a service
 * as COMPLETED and attaches the same deployed item to each.
 *
 * Updates run one at a time in the order the server listed the instances.
 * Each instance keeps the description it was listed with (null when it had
 * none). The first failed update stops the run: later instances are not attempted
 * and earlier ones stay completed. The failure is reported in the returned
 * CompletionReport rather than thrown, so the caller always learns how far
 * the run got. A failure while listing is thrown, since nothing has been
 * written at that point. Errors that are not OrcaErrors always propagate.
 */

import { describeError, isOrcaError } from '../errors.js';
import type { ApiContext } from '../http/api-request.js';
import { STATE_APPROVED, STATE_COMPLETED } from '../schemas/input.schema.js';
import type { CompletionOutcome, CompletionReport } from '../schemas/output.schema.js';
import { listChangeInstances } from './change-instance-repository.js';
import { updateChangeInstance } from './change-instance-updater.js';

export interface CompletionOptions {
  /** List what would be completed without sending any update */
  dryRun?: boolean;
}

function pluralize(count: number): string {
  return `${count} change${count === 1 ? '' : 's'}`;
}

export async function completeApprovedChanges(
  ctx: ApiContext,
  token: string,
  serviceName: string,
  deployedItem: unknown,
  options: CompletionOptions = {},
): Promise<CompletionReport> {
  const logger = ctx.logger.child({ serviceName });
  const approved = await listChangeInstances(ctx, token, {
    state: STATE_APPROVED,
    serviceName,
  });
  logger.info('Found approved changes', { count: approved.length });

  if (options.dryRun) {
    return {
      count: 0,
      message: `Would complete ${pluralize(approved.length)}`,
      successful: true,
      outcomes: approved.map((change) => ({ uuid: change.uuid, status: 'skipped' as const })),
    };
  }

  const outcomes: CompletionOutcome[] = [];
  let count = 0;

  for (const change of approved) {
    logger.debug('Completing change instance', { uuid: change.uuid });
    try {
      await updateChangeInstance(ctx, token, change.uuid, {
        state: STATE_COMPLETED,
        deployedItem,
        description: change.description ?? null,
      });
    } catch (err) {
      if (!isOrcaError(err)) throw err;
      const error = describeError(err);
      outcomes.push({ uuid: change.uuid, status: 'failed', error });
      logger.error('Completion aborted', { uuid: change.uuid, completed: count, error: err });
      return {
        count,
        message: `Completed ${pluralize(count)} before ${change.uuid} failed: ${error}`,
        successful: false,
        outcomes,
      };
    }
    outcomes.push({ uuid: change.uuid, status: 'completed' });
    count++;
  }

  logger.info('Completed approved changes', { count });
  return {
    count,
    message: `Completed ${pluralize(count)}`,
    successful: true,
    outcomes,
  };
}
