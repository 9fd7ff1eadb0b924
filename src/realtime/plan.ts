/**
 * Store plans: an ordered list of primitive store operations applied as one unit
 */

import { getLogger } from '../logger';
import {
  DocumentStore,
  StoreOperation,
  describeOperation,
} from '../storage/types';
import { PartialApplicationError } from './errors';

export type StorePlan = StoreOperation[];

/**
 * Apply a plan. Plans of more than one step run inside a store transaction
 * when the store has them; otherwise steps run in order, and a failure after
 * the first applied step raises PartialApplicationError. Plans are never
 * retried here.
 */
export async function applyPlan(
  store: DocumentStore,
  plan: StorePlan,
): Promise<void> {
  const logger = getLogger();
  if (plan.length === 0) {
    return;
  }
  logger.log('store', `plan: ${plan.map(describeOperation).join(', ')}`);

  if (plan.length > 1 && store.supportsTransactions) {
    await store.transaction(async (writer) => {
      for (const operation of plan) {
        await writer.apply(operation);
      }
    });
    return;
  }

  let completed = 0;
  for (const operation of plan) {
    try {
      await store.apply(operation);
    } catch (error: unknown) {
      if (completed === 0) {
        throw error;
      }
      logger.error(
        'error',
        `Plan failed at step ${completed + 1}/${plan.length} (${describeOperation(operation)})`,
      );
      throw new PartialApplicationError(completed, plan.length, error);
    }
    completed++;
  }
}
