import { InvalidStateError } from '../../../common/errors/domain.errors';
import { AdBoost } from '../entities/ad-boost.entity';
import { PremiumSubscription } from '../entities/premium-subscription.entity';
import { Transaction, TransactionType } from '../entities/transaction.entity';

/**
 * What a transaction pays for. Exactly one target, so "neither" and "both"
 * cannot be expressed by callers.
 */
export type Entitlement =
  | { kind: 'subscription'; subscription: PremiumSubscription }
  | { kind: 'ad_boost'; adBoost: AdBoost };

export function transactionTypeOf(entitlement: Entitlement): TransactionType {
  return entitlement.kind === 'subscription' ? TransactionType.SUBSCRIPTION : TransactionType.AD_BOOST;
}

/**
 * Reads the stored pair of nullable references back into an Entitlement.
 */
export function resolveEntitlement(transaction: Transaction): Entitlement {
  const { subscription, adBoost } = transaction;

  if (subscription && adBoost) {
    throw new InvalidStateError(
      `Transaction ${transaction.transactionReference} references both a subscription and an ad boost.`,
    );
  }
  if (subscription) {
    return { kind: 'subscription', subscription };
  }
  if (adBoost) {
    return { kind: 'ad_boost', adBoost };
  }
  throw new InvalidStateError(
    `Transaction ${transaction.transactionReference} has nothing to activate.`,
  );
}
