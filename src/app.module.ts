import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { PostgreSqlDriver } from '@mikro-orm/postgresql';
import { BullModule } from '@nestjs/bull';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { AuthModule } from './modules/auth/auth.module';
import { UserModule } from './modules/user/user.module';
import { CategoryModule } from './modules/category/category.module';
import { AdsModule } from './modules/ads/ads.module';
import { PaymentModule } from './modules/payment/payment.module';
import { NotificationModule } from './modules/notification/notification.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    MikroOrmModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        driver: PostgreSqlDriver,
        host: configService.getOrThrow<string>('config.database.host'),
        port: configService.getOrThrow<number>('config.database.port'),
        user: configService.getOrThrow<string>('config.database.username'),
        password: configService.getOrThrow<string>('config.database.password'),
        dbName: configService.getOrThrow<string>('config.database.database'),
        autoLoadEntities: true,
        debug: configService.get<string>('config.app.environment') === 'development',
      }),
      inject: [ConfigService],
    }),
    BullModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        redis: {
          host: configService.getOrThrow<string>('config.redis.host'),
          port: configService.getOrThrow<number>('config.redis.port'),
        },
      }),
      inject: [ConfigService],
    }),
    ScheduleModule.forRoot(),
    AuthModule,
    UserModule,
    CategoryModule,
    AdsModule,
    PaymentModule,
    NotificationModule,
  ],
})
export class AppModule {}
