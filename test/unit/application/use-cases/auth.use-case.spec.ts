import { AuthUseCase } from '@application/use-cases';
import {
  ICustomerRepositoryPort,
  IPasswordHasherPort,
  ITokenServicePort,
  IUserRepositoryPort,
} from '@application/ports';
import {
  AccountDeactivatedError,
  EmailAlreadyRegisteredError,
  InvalidCredentialsError,
  UserNotFoundError,
  ValidationError,
} from '@application/errors';
import { Customer, User } from '@domain/entities';
import { Email, EntityId } from '@domain/value-objects';

describe('AuthUseCase', () => {
  let mockUserRepository: jest.Mocked<IUserRepositoryPort>;
  let mockCustomerRepository: jest.Mocked<ICustomerRepositoryPort>;
  let mockTokenService: jest.Mocked<ITokenServicePort>;
  let mockPasswordHasher: jest.Mocked<IPasswordHasherPort>;
  let useCase: AuthUseCase;

  const expiresAt = new Date('2030-01-01T00:00:00Z');

  const createTestUser = (isActive = true): User =>
    User.reconstitute({
      id: EntityId.fromString('user', 'usr_ada'),
      email: Email.fromString('ada@example.com'),
      passwordHash: 'stored-hash',
      firstName: 'Ada',
      lastName: 'Lovelace',
      phoneNumber: null,
      roles: ['customer'],
      isActive,
      createdAt: new Date('2024-01-01T00:00:00Z'),
    });

  beforeEach(() => {
    mockUserRepository = {
      save: jest.fn().mockResolvedValue(undefined),
      findById: jest.fn(),
      findByEmail: jest.fn().mockResolvedValue(null),
    };
    mockCustomerRepository = {
      save: jest.fn().mockResolvedValue(undefined),
      findById: jest.fn(),
      findByEmail: jest.fn().mockResolvedValue(null),
      findAll: jest.fn(),
    };
    mockTokenService = {
      issue: jest.fn().mockResolvedValue({ token: 'signed-token', expiresAt }),
      verify: jest.fn(),
    };
    mockPasswordHasher = {
      hash: jest.fn().mockResolvedValue('hashed-password'),
      verify: jest.fn().mockResolvedValue(true),
    };

    useCase = new AuthUseCase(
      mockUserRepository,
      mockCustomerRepository,
      mockTokenService,
      mockPasswordHasher,
    );
  });

  describe('register', () => {
    const validInput = {
      email: 'Ada@Example.com',
      password: 'coffee123',
      firstName: 'Ada',
      lastName: 'Lovelace',
    };

    it('should create a customer account and sign it in', async () => {
      // Act
      const result = await useCase.register(validInput);

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.token).toBe('signed-token');
        expect(result.value.expiresAt).toBe(expiresAt);
        expect(result.value.user.email).toBe('ada@example.com');
        expect(result.value.user.roles).toEqual(['customer']);
      }
      expect(mockPasswordHasher.hash).toHaveBeenCalledWith('coffee123');
      const [savedUser] = mockUserRepository.save.mock.calls[0];
      expect(savedUser.passwordHash).toBe('hashed-password');
      expect(mockTokenService.issue).toHaveBeenCalledWith({
        sub: savedUser.id.toString(),
        email: 'ada@example.com',
        roles: ['customer'],
      });
    });

    it('should create a linked customer profile', async () => {
      // Act
      await useCase.register(validInput);

      // Assert
      const [savedUser] = mockUserRepository.save.mock.calls[0];
      const [savedCustomer] = mockCustomerRepository.save.mock.calls[0];
      expect(savedCustomer.name).toBe('Ada Lovelace');
      expect(savedCustomer.email.toString()).toBe('ada@example.com');
      expect(savedCustomer.userId?.equals(savedUser.id)).toBe(true);
    });

    it('should keep an existing customer profile with the same email', async () => {
      // Arrange
      mockCustomerRepository.findByEmail.mockResolvedValue(
        Customer.create({ name: 'Ada', email: 'ada@example.com' }),
      );

      // Act
      const result = await useCase.register(validInput);

      // Assert
      expect(result.isRight()).toBe(true);
      expect(mockCustomerRepository.save).not.toHaveBeenCalled();
    });

    it('should reject a weak password before touching the repository', async () => {
      // Act
      const result = await useCase.register({ ...validInput, password: 'lettersonly' });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(ValidationError);
        expect(result.value.message).toBe(
          'Password must be at least 8 characters and contain a letter and a digit',
        );
      }
      expect(mockUserRepository.findByEmail).not.toHaveBeenCalled();
    });

    it('should reject an email that is already registered', async () => {
      // Arrange
      mockUserRepository.findByEmail.mockResolvedValue(createTestUser());

      // Act
      const result = await useCase.register(validInput);

      // Assert
      expect(result.isLeft() && result.value).toBeInstanceOf(EmailAlreadyRegisteredError);
      expect(mockUserRepository.save).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    it('should issue a token for valid credentials', async () => {
      // Arrange
      mockUserRepository.findByEmail.mockResolvedValue(createTestUser());

      // Act
      const result = await useCase.login({ email: ' ADA@example.com', password: 'coffee123' });

      // Assert
      expect(mockUserRepository.findByEmail).toHaveBeenCalledWith('ada@example.com');
      expect(mockPasswordHasher.verify).toHaveBeenCalledWith('coffee123', 'stored-hash');
      expect(result.isRight() && result.value.token).toBe('signed-token');
    });

    it('should answer an unknown email with InvalidCredentialsError', async () => {
      // Act
      const result = await useCase.login({ email: 'nobody@example.com', password: 'coffee123' });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(InvalidCredentialsError);
        expect(result.value.message).toBe('Invalid email or password');
      }
      expect(mockPasswordHasher.verify).not.toHaveBeenCalled();
    });

    it('should answer a wrong password with InvalidCredentialsError', async () => {
      // Arrange
      mockUserRepository.findByEmail.mockResolvedValue(createTestUser());
      mockPasswordHasher.verify.mockResolvedValue(false);

      // Act
      const result = await useCase.login({ email: 'ada@example.com', password: 'wrong123' });

      // Assert
      expect(result.isLeft() && result.value).toBeInstanceOf(InvalidCredentialsError);
      expect(mockTokenService.issue).not.toHaveBeenCalled();
    });

    it('should refuse a deactivated account once the password matches', async () => {
      // Arrange
      mockUserRepository.findByEmail.mockResolvedValue(createTestUser(false));

      // Act
      const result = await useCase.login({ email: 'ada@example.com', password: 'coffee123' });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(AccountDeactivatedError);
        expect(result.value.statusCode).toBe(403);
      }
    });
  });

  describe('getCurrentUser', () => {
    it('should return the user profile', async () => {
      // Arrange
      mockUserRepository.findById.mockResolvedValue(createTestUser());

      // Act
      const result = await useCase.getCurrentUser('usr_ada');

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value).toEqual({
          id: 'usr_ada',
          email: 'ada@example.com',
          firstName: 'Ada',
          lastName: 'Lovelace',
          phoneNumber: null,
          roles: ['customer'],
          isActive: true,
          createdAt: new Date('2024-01-01T00:00:00Z'),
        });
      }
    });

    it('should return UserNotFoundError for a missing user', async () => {
      // Arrange
      mockUserRepository.findById.mockResolvedValue(null);

      // Act
      const result = await useCase.getCurrentUser('usr_gone');

      // Assert
      expect(result.isLeft() && result.value).toBeInstanceOf(UserNotFoundError);
    });
  });
});
