import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { appConfig, type AppConfig } from './config/app.config';
import { validateEnv } from './config/env.validation';
import { BotModule } from './modules/bot/bot.module';
import { LedgerModule } from './modules/ledger/ledger.module';
import { buildLedgerDataSourceOptions } from './modules/ledger/ledger.datasource';
import { LogsModule } from './modules/logs/logs.module';
import { PaymentsModule } from './modules/payments/payments.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [appConfig], validate: validateEnv }),
    TypeOrmModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (config: AppConfig) => buildLedgerDataSourceOptions(config),
    }),
    LedgerModule,
    PaymentsModule,
    BotModule,
    HealthModule,
    LogsModule,
  ],
})
export class AppModule {}
