import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PayRouteModule, PayRouteModuleConfig } from './modules';
import { PAYMENTS_CONFIG_KEY, paymentsConfig } from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [paymentsConfig],
    }),
    PayRouteModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService): PayRouteModuleConfig =>
        configService.getOrThrow<PayRouteModuleConfig>(PAYMENTS_CONFIG_KEY),
      webhookPath: process.env.PAYMENTS_WEBHOOK_PATH || undefined,
      healthPath: process.env.PAYMENTS_HEALTH_PATH || undefined,
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
