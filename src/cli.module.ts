import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigModule, EnvConfigService } from '@infrastructure/config';
import { LoggerModule } from '@infrastructure/observability/logging';
import { SeedsModule } from '@infrastructure/database/seeds/seeds.module';

/**
 * Module for CLI commands.
 *
 * This module is used as the entry point for nest-commander,
 * providing database seeding and other CLI utilities.
 */
@Module({
  imports: [
    ConfigModule,
    LoggerModule,
    MongooseModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (envConfig: EnvConfigService) => ({
        uri: envConfig.mongoUri,
        serverSelectionTimeoutMS: 30000,
      }),
    }),
    SeedsModule,
  ],
})
export class CliModule {}
