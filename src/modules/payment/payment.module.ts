import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { NotificationModule } from '../notification/notification.module';
import { AuthModule } from '../auth/auth.module';
import { PricingPlan } from './entities/pricing-plan.entity';
import { PremiumSubscription } from './entities/premium-subscription.entity';
import { AdBoost } from './entities/ad-boost.entity';
import { Transaction } from './entities/transaction.entity';
import { PricingPlanService } from './services/pricing-plan.service';
import { SubscriptionService } from './services/subscription.service';
import { AdBoostService } from './services/ad-boost.service';
import { TransactionLedgerService } from './services/transaction-ledger.service';
import { EntitlementActivatorService } from './services/entitlement-activator.service';
import { EntitlementExpiryService } from './services/entitlement-expiry.service';
import { PricingPlanController } from './controllers/pricing-plan.controller';
import { SubscriptionController } from './controllers/subscription.controller';
import { AdBoostController } from './controllers/ad-boost.controller';
import { TransactionController } from './controllers/transaction.controller';
import { PaymentCallbackController } from './controllers/payment-callback.controller';
import { PaymentCallbackGuard } from './guards/payment-callback.guard';

@Module({
  imports: [
    MikroOrmModule.forFeature([PricingPlan, PremiumSubscription, AdBoost, Transaction]),
    NotificationModule,
    AuthModule,
  ],
  controllers: [
    PricingPlanController,
    SubscriptionController,
    AdBoostController,
    TransactionController,
    PaymentCallbackController,
  ],
  providers: [
    PricingPlanService,
    SubscriptionService,
    AdBoostService,
    TransactionLedgerService,
    EntitlementActivatorService,
    EntitlementExpiryService,
    PaymentCallbackGuard,
  ],
})
export class PaymentModule {}
