import { InvalidStateError } from '../../../common/errors/domain.errors';
import { makeAdBoost, makeSubscription, makeTransaction } from '../../../test-utils/factories';
import { TransactionType } from '../entities/transaction.entity';
import { resolveEntitlement, transactionTypeOf } from './entitlement';

describe('resolveEntitlement', () => {
  it('resolves a subscription purchase', () => {
    const subscription = makeSubscription();
    const transaction = makeTransaction({ subscription });

    expect(resolveEntitlement(transaction)).toEqual({ kind: 'subscription', subscription });
  });

  it('resolves an ad boost purchase', () => {
    const adBoost = makeAdBoost();
    const transaction = makeTransaction({ transactionType: TransactionType.AD_BOOST, adBoost });

    expect(resolveEntitlement(transaction)).toEqual({ kind: 'ad_boost', adBoost });
  });

  it('rejects a transaction that references both targets', () => {
    const transaction = makeTransaction({ subscription: makeSubscription(), adBoost: makeAdBoost() });

    expect(() => resolveEntitlement(transaction)).toThrow(
      new InvalidStateError(
        'Transaction TXN-20250310-00000000000000AA references both a subscription and an ad boost.',
      ),
    );
  });

  it('rejects a transaction with nothing to activate', () => {
    expect(() => resolveEntitlement(makeTransaction())).toThrow(
      'Transaction TXN-20250310-00000000000000AA has nothing to activate.',
    );
  });
});

describe('transactionTypeOf', () => {
  it('maps each entitlement kind to its transaction type', () => {
    expect(transactionTypeOf({ kind: 'subscription', subscription: makeSubscription() })).toBe(
      TransactionType.SUBSCRIPTION,
    );
    expect(transactionTypeOf({ kind: 'ad_boost', adBoost: makeAdBoost() })).toBe(TransactionType.AD_BOOST);
  });
});
