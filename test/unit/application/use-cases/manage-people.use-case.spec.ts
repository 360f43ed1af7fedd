import { ManagePeopleUseCase } from '@application/use-cases';
import {
  IBaristaRepositoryPort,
  ICustomerRepositoryPort,
  IUserRepositoryPort,
} from '@application/ports';
import {
  BaristaNotFoundError,
  DuplicateNameError,
  EmailAlreadyRegisteredError,
  UserNotFoundError,
  ValidationError,
} from '@application/errors';
import { Barista, Customer, User } from '@domain/entities';
import { Email, EntityId } from '@domain/value-objects';

describe('ManagePeopleUseCase', () => {
  let mockCustomerRepository: jest.Mocked<ICustomerRepositoryPort>;
  let mockBaristaRepository: jest.Mocked<IBaristaRepositoryPort>;
  let mockUserRepository: jest.Mocked<IUserRepositoryPort>;
  let useCase: ManagePeopleUseCase;

  const staffUser = User.reconstitute({
    id: EntityId.fromString('user', 'usr_marco'),
    email: Email.fromString('marco@example.com'),
    passwordHash: 'scrypt$00$00',
    firstName: 'Marco',
    lastName: 'Rossi',
    phoneNumber: null,
    roles: ['barista'],
    isActive: true,
    createdAt: new Date('2024-01-01T00:00:00Z'),
  });

  const createTestBarista = (isActive: boolean): Barista =>
    Barista.reconstitute({
      id: EntityId.fromString('barista', 'bar_1'),
      userId: staffUser.id,
      name: 'Marco',
      isActive,
      createdAt: new Date('2024-01-01T00:00:00Z'),
      updatedAt: null,
    });

  beforeEach(() => {
    mockCustomerRepository = {
      save: jest.fn().mockResolvedValue(undefined),
      findById: jest.fn(),
      findByEmail: jest.fn().mockResolvedValue(null),
      findAll: jest.fn(),
    };
    mockBaristaRepository = {
      save: jest.fn().mockResolvedValue(undefined),
      findById: jest.fn(),
      findByUserId: jest.fn().mockResolvedValue(null),
      findAll: jest.fn(),
    };
    mockUserRepository = {
      save: jest.fn(),
      findById: jest.fn().mockResolvedValue(staffUser),
      findByEmail: jest.fn(),
    };

    useCase = new ManagePeopleUseCase(
      mockCustomerRepository,
      mockBaristaRepository,
      mockUserRepository,
    );
  });

  describe('registerCustomer', () => {
    it('should register a walk-in customer with a normalized email', async () => {
      // Act
      const result = await useCase.registerCustomer({
        name: 'Ada Lovelace',
        email: ' Ada@Example.com ',
        phone: '555-0100',
      });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.email).toBe('ada@example.com');
        expect(result.value.phone).toBe('555-0100');
        expect(result.value.address).toBeNull();
        expect(result.value.userId).toBeNull();
      }
      expect(mockCustomerRepository.findByEmail).toHaveBeenCalledWith('ada@example.com');
      expect(mockCustomerRepository.save).toHaveBeenCalledTimes(1);
    });

    it('should reject an email that is already registered', async () => {
      // Arrange
      mockCustomerRepository.findByEmail.mockResolvedValue(
        Customer.create({ name: 'Ada Lovelace', email: 'ada@example.com' }),
      );

      // Act
      const result = await useCase.registerCustomer({ name: 'Ada L.', email: 'ada@example.com' });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(EmailAlreadyRegisteredError);
        expect(result.value.message).toBe("User with email 'ada@example.com' already exists");
      }
      expect(mockCustomerRepository.save).not.toHaveBeenCalled();
    });

    it('should reject an invalid email', async () => {
      // Act
      const result = await useCase.registerCustomer({ name: 'Ada', email: 'not-an-email' });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(ValidationError);
        expect(result.value.message).toBe('Invalid email: "not-an-email" is not a valid address');
      }
    });
  });

  describe('createBarista', () => {
    it('should create an active barista for an existing user', async () => {
      // Act
      const result = await useCase.createBarista({ userId: 'usr_marco', name: 'Marco' });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.userId).toBe('usr_marco');
        expect(result.value.isActive).toBe(true);
      }
      expect(mockBaristaRepository.save).toHaveBeenCalledTimes(1);
    });

    it('should fail for an unknown user', async () => {
      // Arrange
      mockUserRepository.findById.mockResolvedValue(null);

      // Act
      const result = await useCase.createBarista({ userId: 'usr_ghost', name: 'Ghost' });

      // Assert
      expect(result.isLeft() && result.value).toBeInstanceOf(UserNotFoundError);
    });

    it('should refuse a second profile for the same user', async () => {
      // Arrange
      mockBaristaRepository.findByUserId.mockResolvedValue(createTestBarista(true));

      // Act
      const result = await useCase.createBarista({ userId: 'usr_marco', name: 'Marco' });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(DuplicateNameError);
        expect(result.value.message).toBe(
          "Barista profile for user named 'usr_marco' already exists",
        );
      }
    });
  });

  describe('setBaristaActive', () => {
    it('should deactivate a barista', async () => {
      // Arrange
      mockBaristaRepository.findById.mockResolvedValue(createTestBarista(true));

      // Act
      const result = await useCase.setBaristaActive({ baristaId: 'bar_1', isActive: false });

      // Assert
      expect(result.isRight() && result.value.isActive).toBe(false);
      expect(result.isRight() && result.value.updatedAt).toBeInstanceOf(Date);
      expect(mockBaristaRepository.save).toHaveBeenCalledTimes(1);
    });

    it('should reactivate a barista', async () => {
      // Arrange
      mockBaristaRepository.findById.mockResolvedValue(createTestBarista(false));

      // Act
      const result = await useCase.setBaristaActive({ baristaId: 'bar_1', isActive: true });

      // Assert
      expect(result.isRight() && result.value.isActive).toBe(true);
    });

    it('should fail for an unknown barista', async () => {
      // Arrange
      mockBaristaRepository.findById.mockResolvedValue(null);

      // Act
      const result = await useCase.setBaristaActive({ baristaId: 'bar_9', isActive: true });

      // Assert
      expect(result.isLeft() && result.value).toBeInstanceOf(BaristaNotFoundError);
    });
  });

  describe('listBaristas', () => {
    it('should pass the active filter through', async () => {
      // Arrange
      mockBaristaRepository.findAll.mockResolvedValue([createTestBarista(true)]);

      // Act
      const result = await useCase.listBaristas({ activeOnly: true });

      // Assert
      expect(mockBaristaRepository.findAll).toHaveBeenCalledWith({ activeOnly: true });
      expect(result.isRight() && result.value.map((barista) => barista.id)).toEqual(['bar_1']);
    });
  });
});
