import { Test, TestingModule } from '@nestjs/testing';
import { MenuSeed, MenuSeederService } from '@infrastructure/database/seeds/menu-seeder.service';
import { EnvConfigService } from '@infrastructure/config/env-config.service';
import {
  ICategoryRepositoryPort,
  ICoffeeItemRepositoryPort,
  IPasswordHasherPort,
  IUserRepositoryPort,
} from '@application/ports';
import { Category, CoffeeItem, User } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';

describe('MenuSeederService', () => {
  let service: MenuSeederService;
  let mockCategoryRepository: jest.Mocked<ICategoryRepositoryPort>;
  let mockCoffeeItemRepository: jest.Mocked<ICoffeeItemRepositoryPort>;
  let mockUserRepository: jest.Mocked<IUserRepositoryPort>;
  let mockPasswordHasher: jest.Mocked<IPasswordHasherPort>;
  let mockEnvConfig: { adminEmail?: string; adminPassword?: string };

  const smallMenu: MenuSeed = {
    categories: [{ name: 'Espresso' }, { name: 'Tea', description: 'Loose leaf' }],
    items: [
      {
        name: 'Americano',
        description: 'Espresso and hot water',
        price: 3.25,
        category: 'Espresso',
      },
      {
        name: 'Affogato',
        description: 'Espresso over ice cream',
        price: 5.5,
        category: 'Espresso',
        available: false,
      },
      { name: 'Chai Latte', description: 'Spiced tea with milk', price: 4.5, category: 'Tea' },
    ],
  };

  beforeEach(async () => {
    mockCategoryRepository = {
      save: jest.fn().mockResolvedValue(undefined),
      findById: jest.fn(),
      findByName: jest.fn().mockResolvedValue(null),
      findAll: jest.fn(),
      deleteAll: jest.fn().mockResolvedValue(undefined),
    };
    mockCoffeeItemRepository = {
      save: jest.fn().mockResolvedValue(undefined),
      findById: jest.fn(),
      findByIds: jest.fn(),
      findAll: jest.fn(),
      existsByName: jest.fn().mockResolvedValue(false),
      count: jest.fn(),
      deleteAll: jest.fn().mockResolvedValue(undefined),
    };
    mockUserRepository = {
      save: jest.fn().mockResolvedValue(undefined),
      findById: jest.fn(),
      findByEmail: jest.fn().mockResolvedValue(null),
    };
    mockPasswordHasher = {
      hash: jest.fn().mockResolvedValue('hashed-password'),
      verify: jest.fn(),
    };
    mockEnvConfig = {};

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MenuSeederService,
        { provide: 'ICategoryRepository', useValue: mockCategoryRepository },
        { provide: 'ICoffeeItemRepository', useValue: mockCoffeeItemRepository },
        { provide: 'IUserRepository', useValue: mockUserRepository },
        { provide: 'IPasswordHasher', useValue: mockPasswordHasher },
        { provide: EnvConfigService, useValue: mockEnvConfig },
      ],
    }).compile();

    service = module.get<MenuSeederService>(MenuSeederService);
  });

  describe('module loading', () => {
    it('should load without a validated environment', async () => {
      // Arrange
      const { MONGO_URI, JWT_SECRET } = process.env;
      delete process.env.MONGO_URI;
      delete process.env.JWT_SECRET;

      try {
        // Act & Assert
        await jest.isolateModulesAsync(async () => {
          const loaded = await import('@infrastructure/database/seeds/menu-seeder.service');
          expect(loaded.MenuSeederService).toBeDefined();
        });
      } finally {
        if (MONGO_URI !== undefined) process.env.MONGO_URI = MONGO_URI;
        if (JWT_SECRET !== undefined) process.env.JWT_SECRET = JWT_SECRET;
      }
    });
  });

  describe('loadSeed', () => {
    it('should parse the bundled menu', () => {
      // Act
      const menu = MenuSeederService.loadSeed();

      // Assert
      expect(menu.categories).toHaveLength(4);
      expect(menu.items).toHaveLength(17);
    });

    it('should reject a malformed menu', () => {
      expect(() =>
        MenuSeederService.loadSeed({ categories: [], items: [{ name: 'Mocha', price: -1 }] }),
      ).toThrow();
    });
  });

  describe('seed', () => {
    it('should create every category and item on an empty database', async () => {
      // Act
      const summary = await service.seed(smallMenu);

      // Assert
      expect(summary).toEqual({
        categoriesCreated: 2,
        itemsCreated: 3,
        itemsSkipped: 0,
        adminCreated: false,
      });
      expect(mockCategoryRepository.save).toHaveBeenCalledTimes(2);
      expect(mockCoffeeItemRepository.save).toHaveBeenCalledTimes(3);
    });

    it('should store items without pending events and honour availability', async () => {
      // Act
      await service.seed(smallMenu);

      // Assert
      const saved = mockCoffeeItemRepository.save.mock.calls.map(([item]) => item);
      expect(saved.map((item) => item.domainEvents.length)).toEqual([0, 0, 0]);
      expect(saved.map((item) => item.isAvailable)).toEqual([true, false, true]);
    });

    it('should link items to their category', async () => {
      // Act
      await service.seed(smallMenu);

      // Assert
      const [tea] = mockCategoryRepository.save.mock.calls[1];
      const [chai] = mockCoffeeItemRepository.save.mock.calls[2];
      expect(chai.categoryId.equals(tea.id)).toBe(true);
    });

    it('should skip what already exists', async () => {
      // Arrange
      mockCategoryRepository.findByName.mockImplementation(async (name) =>
        name === 'Espresso' ? Category.create({ name: 'Espresso' }) : null,
      );
      mockCoffeeItemRepository.existsByName.mockImplementation(
        async (name) => name === 'Americano',
      );

      // Act
      const summary = await service.seed(smallMenu);

      // Assert
      expect(summary.categoriesCreated).toBe(1);
      expect(summary.itemsCreated).toBe(2);
      expect(summary.itemsSkipped).toBe(1);
    });

    it('should fail on an item with an unknown category', async () => {
      // Arrange
      const menu: MenuSeed = {
        categories: [],
        items: [
          { name: 'Mocha', description: 'Chocolate espresso', price: 4.95, category: 'Nope' },
        ],
      };

      // Act & Assert
      await expect(service.seed(menu)).rejects.toThrow(
        "Seed item 'Mocha' refers to unknown category 'Nope'",
      );
    });
  });

  describe('admin account', () => {
    it('should create the admin when credentials are configured', async () => {
      // Arrange
      mockEnvConfig.adminEmail = 'Admin@Example.com';
      mockEnvConfig.adminPassword = 'change-me-123';

      // Act
      const summary = await service.seed({ categories: [], items: [] });

      // Assert
      expect(summary.adminCreated).toBe(true);
      expect(mockUserRepository.findByEmail).toHaveBeenCalledWith('admin@example.com');
      expect(mockPasswordHasher.hash).toHaveBeenCalledWith('change-me-123');
      const [admin] = mockUserRepository.save.mock.calls[0];
      expect(admin.email.toString()).toBe('admin@example.com');
      expect(admin.roles).toEqual(['admin']);
    });

    it('should leave an existing admin alone', async () => {
      // Arrange
      mockEnvConfig.adminEmail = 'admin@example.com';
      mockEnvConfig.adminPassword = 'change-me-123';
      mockUserRepository.findByEmail.mockResolvedValue(
        User.create({
          email: 'admin@example.com',
          passwordHash: 'stored-hash',
          firstName: 'Shop',
          lastName: 'Admin',
          roles: ['admin'],
        }),
      );

      // Act
      const summary = await service.seed({ categories: [], items: [] });

      // Assert
      expect(summary.adminCreated).toBe(false);
      expect(mockUserRepository.save).not.toHaveBeenCalled();
    });

    it('should skip the admin without credentials', async () => {
      // Act
      const summary = await service.seed({ categories: [], items: [] });

      // Assert
      expect(summary.adminCreated).toBe(false);
      expect(mockUserRepository.findByEmail).not.toHaveBeenCalled();
    });
  });

  describe('clear and stats', () => {
    it('should delete items before categories', async () => {
      // Act
      await service.clear();

      // Assert
      expect(mockCoffeeItemRepository.deleteAll.mock.invocationCallOrder[0]).toBeLessThan(
        mockCategoryRepository.deleteAll.mock.invocationCallOrder[0],
      );
    });

    it('should count items per category name', async () => {
      // Arrange
      const espresso = Category.create({ name: 'Espresso' });
      const item = (name: string, categoryId: string): CoffeeItem =>
        CoffeeItem.reconstitute({
          id: EntityId.generate('coffeeItem'),
          name,
          description: name,
          price: Money.price(3),
          isAvailable: true,
          categoryId: EntityId.fromString('category', categoryId),
          imageUrl: null,
          createdAt: new Date('2024-01-01T00:00:00Z'),
          updatedAt: null,
          version: 1,
        });
      mockCategoryRepository.findAll.mockResolvedValue([espresso]);
      mockCoffeeItemRepository.findAll.mockResolvedValue([
        item('Americano', espresso.id.toString()),
        item('Cortado', espresso.id.toString()),
        item('Mystery', 'cat_removed'),
      ]);

      // Act
      const stats = await service.getStats();

      // Assert
      expect(mockCoffeeItemRepository.findAll).toHaveBeenCalledWith({ availableOnly: false });
      expect(stats).toEqual({ totalItems: 3, categories: { Espresso: 2, Uncategorized: 1 } });
    });
  });
});
