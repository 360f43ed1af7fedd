import { Module } from '@nestjs/common';
import { AuthModule } from '@infrastructure/adapters/auth';
import { MongoDBModule } from '@infrastructure/adapters/persistence/mongodb';
import { MenuSeederService } from './menu-seeder.service';
import { SeedCommand } from './seed.command';

/**
 * Module for database seeding functionality.
 */
@Module({
  imports: [MongoDBModule, AuthModule],
  providers: [MenuSeederService, SeedCommand],
  exports: [MenuSeederService],
})
export class SeedsModule {}
