import { Module } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { MongooseModule } from '@nestjs/mongoose';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { ConfigModule, EnvConfigService } from '@infrastructure/config';
import { HttpModule } from '@infrastructure/http';
import { LoggerModule } from '@infrastructure/observability/logging';
import { MetricsInterceptor, MetricsModule } from '@infrastructure/observability/metrics';

@Module({
  imports: [
    // Validated environment, available everywhere
    ConfigModule,
    LoggerModule,
    MetricsModule,

    MongooseModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (envConfig: EnvConfigService) => ({
        uri: envConfig.mongoUri,
      }),
    }),

    ThrottlerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (envConfig: EnvConfigService) => [
        { ttl: envConfig.throttleTtlMs, limit: envConfig.throttleLimit },
      ],
    }),

    HttpModule,
  ],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    { provide: APP_INTERCEPTOR, useClass: MetricsInterceptor },
  ],
})
export class AppModule {}
