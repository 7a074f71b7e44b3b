import { makeTransaction } from '../../../../test-utils/factories';
import { TransactionStatus } from '../transaction.entity';

describe('Transaction', () => {
  it('starts pending with empty metadata and notes', () => {
    const transaction = makeTransaction();

    expect(transaction.status).toBe(TransactionStatus.PENDING);
    expect(transaction.metadata).toEqual({});
    expect(transaction.notes).toBe('');
    expect(transaction.currency).toBe('KES');
  });

  it.each([
    [TransactionStatus.PENDING, false],
    [TransactionStatus.PROCESSING, false],
    [TransactionStatus.COMPLETED, true],
    [TransactionStatus.FAILED, true],
    [TransactionStatus.REFUNDED, true],
  ])('treats %s as terminal: %p', (status, terminal) => {
    expect(makeTransaction({ status }).isTerminal()).toBe(terminal);
  });
});
