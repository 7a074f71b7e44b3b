import { Injectable, Logger } from '@nestjs/common';
import { EntityManager, LockMode, QueryOrder } from '@mikro-orm/core';
import { InvalidStateError, NotFoundError } from '../../../common/errors/domain.errors';
import { User } from '../../user/entities/user.entity';
import { NotificationService } from '../../notification/notification.service';
import { NotificationTemplate } from '../../notification/notification.types';
import { PaymentMethod, Transaction, TransactionStatus } from '../entities/transaction.entity';
import { Entitlement, transactionTypeOf } from '../utils/entitlement';
import { generateTransactionReference } from '../utils/transaction-reference';
import { EntitlementActivatorService } from './entitlement-activator.service';

export const MAX_REFERENCE_ATTEMPTS = 5;

export interface CreateTransactionParams {
  user: User;
  amount: number;
  currency: string;
  paymentMethod: PaymentMethod;
  entitlement: Entitlement;
}

export type CallbackStatus = TransactionStatus.COMPLETED | TransactionStatus.FAILED;

export interface PaymentCallback {
  reference: string;
  status: CallbackStatus;
  providerReference?: string;
  metadata?: Record<string, unknown>;
}

export interface CallbackResult {
  transaction: Transaction;
  /** True when the transaction already carried this outcome and nothing was written. */
  alreadyProcessed: boolean;
}

@Injectable()
export class TransactionLedgerService {
  private readonly logger = new Logger(TransactionLedgerService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly activator: EntitlementActivatorService,
    private readonly notificationService: NotificationService,
  ) {}

  /**
   * Records a pending payment for an entitlement. Persists through `em`, which
   * is the purchase's transactional EntityManager; nothing is flushed here.
   */
  async createTransaction(em: EntityManager, params: CreateTransactionParams): Promise<Transaction> {
    const { entitlement } = params;
    const transactionReference = await this.allocateReference(em);

    const transaction = em.create(Transaction, {
      user: params.user,
      transactionType: transactionTypeOf(entitlement),
      subscription: entitlement.kind === 'subscription' ? entitlement.subscription : undefined,
      adBoost: entitlement.kind === 'ad_boost' ? entitlement.adBoost : undefined,
      amount: params.amount,
      currency: params.currency,
      paymentMethod: params.paymentMethod,
      status: TransactionStatus.PENDING,
      transactionReference,
    });
    em.persist(transaction);

    this.logger.log(
      `Created ${transaction.transactionType} transaction ${transactionReference} for user ${params.user.id}: ${params.amount} ${params.currency}`,
    );
    return transaction;
  }

  /**
   * Applies a gateway callback. The transaction row is locked for the duration,
   * so redelivered callbacks are serialised and the second one sees the first
   * one's outcome.
   */
  async applyCallback(callback: PaymentCallback): Promise<CallbackResult> {
    const result = await this.em.transactional(async (em) => {
      const transaction = await em.findOne(
        Transaction,
        { transactionReference: callback.reference },
        {
          populate: ['subscription.user', 'adBoost.ad'],
          lockMode: LockMode.PESSIMISTIC_WRITE,
        },
      );
      if (!transaction) {
        throw new NotFoundError('Transaction not found.');
      }

      if (transaction.isTerminal()) {
        if (transaction.status === callback.status) {
          this.logger.log(`Ignoring repeated ${callback.status} callback for ${callback.reference}`);
          return { transaction, alreadyProcessed: true };
        }
        throw new InvalidStateError(`Transaction is already ${transaction.status}.`);
      }

      if (callback.providerReference) {
        transaction.paymentProviderReference = callback.providerReference;
      }
      if (callback.metadata) {
        transaction.metadata = { ...transaction.metadata, ...callback.metadata };
      }

      if (callback.status === TransactionStatus.COMPLETED) {
        transaction.status = TransactionStatus.COMPLETED;
        await this.activator.activate(em, transaction);
      } else {
        transaction.status = TransactionStatus.FAILED;
      }

      this.logger.log(`Transaction ${callback.reference} marked ${transaction.status}`);
      return { transaction, alreadyProcessed: false };
    });

    if (!result.alreadyProcessed) {
      this.notifyOutcome(result.transaction);
    }
    return result;
  }

  async listForUser(userId: string): Promise<Transaction[]> {
    return this.em.find(Transaction, { user: userId }, { orderBy: { createdAt: QueryOrder.DESC } });
  }

  async findForUser(id: string, userId: string): Promise<Transaction> {
    const transaction = await this.em.findOne(Transaction, { id, user: userId });
    if (!transaction) {
      throw new NotFoundError('Transaction not found.');
    }
    return transaction;
  }

  private async allocateReference(em: EntityManager): Promise<string> {
    for (let attempt = 1; attempt <= MAX_REFERENCE_ATTEMPTS; attempt++) {
      const reference = generateTransactionReference();
      const taken = await em.count(Transaction, { transactionReference: reference });
      if (taken === 0) {
        return reference;
      }
      this.logger.warn(`Transaction reference ${reference} already in use (attempt ${attempt})`);
    }
    throw new Error(`Could not allocate a unique transaction reference after ${MAX_REFERENCE_ATTEMPTS} attempts`);
  }

  private notifyOutcome(transaction: Transaction): void {
    const template =
      transaction.status === TransactionStatus.COMPLETED
        ? NotificationTemplate.PAYMENT_COMPLETED
        : NotificationTemplate.PAYMENT_FAILED;

    this.notificationService.notify(transaction.user.id, template, {
      reference: transaction.transactionReference,
      amount: Number(transaction.amount).toFixed(2),
      currency: transaction.currency,
      description: describePurchase(transaction),
    });
  }
}

export function describePurchase(transaction: Transaction): string {
  if (transaction.subscription) {
    return `${transaction.subscription.subscriptionType} subscription`;
  }
  if (transaction.adBoost) {
    return `${transaction.adBoost.boostType} ad boost`;
  }
  return 'your purchase';
}
