import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  ICategoryRepositoryPort,
  ICoffeeItemRepositoryPort,
  IPasswordHasherPort,
  IUserRepositoryPort,
} from '@application/ports/outbound';
import { Category, CoffeeItem, User } from '@domain/entities';
import { EnvConfigService } from '@infrastructure/config/env-config.service';
import menuSeedJson from './menu.seed.json';

const menuSeedSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().optional(),
    }),
  ),
  items: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().min(1),
      price: z.number().positive(),
      category: z.string().min(1),
      available: z.boolean().optional(),
    }),
  ),
});

export type MenuSeed = z.infer<typeof menuSeedSchema>;

export interface SeedSummary {
  categoriesCreated: number;
  itemsCreated: number;
  itemsSkipped: number;
  adminCreated: boolean;
}

export interface MenuStats {
  totalItems: number;
  categories: Record<string, number>;
}

/**
 * Loads the starter menu and the admin account.
 * Seeding is idempotent: existing categories, items and users are left alone.
 */
@Injectable()
export class MenuSeederService {
  private readonly logger = new Logger(MenuSeederService.name);

  constructor(
    @Inject('ICategoryRepository')
    private readonly categoryRepository: ICategoryRepositoryPort,
    @Inject('ICoffeeItemRepository')
    private readonly coffeeItemRepository: ICoffeeItemRepositoryPort,
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IPasswordHasher')
    private readonly passwordHasher: IPasswordHasherPort,
    private readonly envConfig: EnvConfigService,
  ) {}

  static loadSeed(raw: unknown = menuSeedJson): MenuSeed {
    return menuSeedSchema.parse(raw);
  }

  async seed(menu: MenuSeed = MenuSeederService.loadSeed()): Promise<SeedSummary> {
    this.logger.log('Starting menu seed process...');

    const summary: SeedSummary = {
      categoriesCreated: 0,
      itemsCreated: 0,
      itemsSkipped: 0,
      adminCreated: false,
    };

    const categoryIds = new Map<string, Category>();
    for (const entry of menu.categories) {
      let category = await this.categoryRepository.findByName(entry.name);
      if (!category) {
        category = Category.create({ name: entry.name, description: entry.description });
        await this.categoryRepository.save(category);
        summary.categoriesCreated++;
      }
      categoryIds.set(entry.name, category);
    }

    for (const entry of menu.items) {
      const category = categoryIds.get(entry.category);
      if (!category) {
        throw new Error(`Seed item '${entry.name}' refers to unknown category '${entry.category}'`);
      }

      if (await this.coffeeItemRepository.existsByName(entry.name)) {
        summary.itemsSkipped++;
        continue;
      }

      const item = CoffeeItem.create({
        name: entry.name,
        description: entry.description,
        price: entry.price,
        categoryId: category.id,
      });
      if (entry.available === false) {
        item.setAvailability(false);
      }
      // Seeded items are not announced as menu events
      item.clearDomainEvents();
      await this.coffeeItemRepository.save(item);
      summary.itemsCreated++;
    }

    summary.adminCreated = await this.ensureAdmin();

    this.logger.log(
      `Seeded ${summary.categoriesCreated} categories and ${summary.itemsCreated} items ` +
        `(${summary.itemsSkipped} already present)`,
    );
    return summary;
  }

  async clear(): Promise<void> {
    this.logger.log('Clearing menu...');
    await this.coffeeItemRepository.deleteAll();
    await this.categoryRepository.deleteAll();
  }

  async reseed(): Promise<SeedSummary> {
    await this.clear();
    return this.seed();
  }

  async getStats(): Promise<MenuStats> {
    const [categories, items] = await Promise.all([
      this.categoryRepository.findAll(),
      this.coffeeItemRepository.findAll({ availableOnly: false }),
    ]);

    const names = new Map(categories.map((category) => [category.id.toString(), category.name]));
    const counts: Record<string, number> = {};
    for (const item of items) {
      const name = names.get(item.categoryId.toString()) ?? 'Uncategorized';
      counts[name] = (counts[name] ?? 0) + 1;
    }

    return { totalItems: items.length, categories: counts };
  }

  // ============ Private Helper Methods ============

  private async ensureAdmin(): Promise<boolean> {
    const email = this.envConfig.adminEmail;
    const password = this.envConfig.adminPassword;
    if (!email || !password) {
      this.logger.debug('ADMIN_EMAIL or ADMIN_PASSWORD not set, skipping admin account');
      return false;
    }

    if (await this.userRepository.findByEmail(email.toLowerCase())) {
      return false;
    }

    const admin = User.create({
      email,
      passwordHash: await this.passwordHasher.hash(password),
      firstName: 'Shop',
      lastName: 'Admin',
      roles: ['admin'],
    });
    await this.userRepository.save(admin);
    this.logger.log(`Admin account created for ${admin.email.toString()}`);
    return true;
  }
}
