import { PaymentMethod, Transaction } from '../entities/transaction.entity';

export interface PaymentInstructions {
  method: string;
  instructions?: string;
  transaction_reference: string;
}

/**
 * Placeholder for the gateway hand-off: tells the client how to pay and which
 * reference the gateway will echo back in its callback.
 */
export function paymentInstructionsFor(transaction: Transaction): PaymentInstructions {
  const reference = transaction.transactionReference;

  switch (transaction.paymentMethod) {
    case PaymentMethod.MPESA:
      return {
        method: 'M-Pesa',
        instructions: 'Please complete payment via M-Pesa.',
        transaction_reference: reference,
      };
    case PaymentMethod.CARD:
      return {
        method: 'Card',
        instructions: 'Proceed to card payment gateway.',
        transaction_reference: reference,
      };
    default:
      return { method: transaction.paymentMethod, transaction_reference: reference };
  }
}
