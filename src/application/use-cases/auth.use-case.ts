import { Inject, Injectable } from '@nestjs/common';
import { Either, left, right } from '../common/either';
import {
  AuthResultDto,
  LoginInputDto,
  RegisterInputDto,
  UserOutputDto,
  toUserOutput,
} from '../dtos/auth.dto';
import {
  AccountDeactivatedError,
  ApplicationError,
  EmailAlreadyRegisteredError,
  InvalidCredentialsError,
  UserNotFoundError,
  ValidationError,
  toApplicationError,
} from '@application/errors';
import { Customer, User } from '@domain/entities';
import { Email, EntityId } from '@domain/value-objects';
import {
  ICustomerRepositoryPort,
  IPasswordHasherPort,
  ITokenServicePort,
  IUserRepositoryPort,
} from '../ports';
import { IAuthPort } from '@application/ports/inbound/auth.port';

const MIN_PASSWORD_LENGTH = 8;

/**
 * AuthUseCase registers accounts and exchanges credentials for access tokens.
 * Self-registered accounts always get the customer role.
 */
@Injectable()
export class AuthUseCase implements IAuthPort {
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('ICustomerRepository')
    private readonly customerRepository: ICustomerRepositoryPort,
    @Inject('ITokenService')
    private readonly tokenService: ITokenServicePort,
    @Inject('IPasswordHasher')
    private readonly passwordHasher: IPasswordHasherPort,
  ) {}

  async register(input: RegisterInputDto): Promise<Either<ApplicationError, AuthResultDto>> {
    try {
      const passwordResult = this.validatePassword(input.password);
      if (passwordResult.isLeft()) {
        return passwordResult;
      }

      const email = Email.fromString(input.email);
      if (await this.userRepository.findByEmail(email.toString())) {
        return left(new EmailAlreadyRegisteredError(email.toString()));
      }

      const user = User.create({
        email: email.toString(),
        passwordHash: await this.passwordHasher.hash(input.password),
        firstName: input.firstName,
        lastName: input.lastName,
        phoneNumber: input.phoneNumber,
        roles: ['customer'],
      });
      await this.userRepository.save(user);

      // Orders are placed against the customer profile, not the account
      if (!(await this.customerRepository.findByEmail(email.toString()))) {
        const customer = Customer.create({
          name: `${user.firstName} ${user.lastName}`,
          email: email.toString(),
          phone: user.phoneNumber,
          userId: user.id,
        });
        await this.customerRepository.save(customer);
      }

      return right(await this.signIn(user));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async login(input: LoginInputDto): Promise<Either<ApplicationError, AuthResultDto>> {
    try {
      const email = typeof input.email === 'string' ? input.email.trim().toLowerCase() : '';
      const user = email ? await this.userRepository.findByEmail(email) : null;
      if (!user) {
        return left(new InvalidCredentialsError());
      }

      const passwordMatches = await this.passwordHasher.verify(
        input.password ?? '',
        user.passwordHash,
      );
      if (!passwordMatches) {
        return left(new InvalidCredentialsError());
      }

      if (!user.isActive) {
        return left(new AccountDeactivatedError());
      }

      return right(await this.signIn(user));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async getCurrentUser(userId: string): Promise<Either<ApplicationError, UserOutputDto>> {
    try {
      const user = await this.userRepository.findById(EntityId.fromString('user', userId));
      if (!user) {
        return left(new UserNotFoundError(userId));
      }
      return right(toUserOutput(user));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  // ============ Private Helper Methods ============

  private validatePassword(password: string): Either<ApplicationError, void> {
    if (
      typeof password !== 'string' ||
      password.length < MIN_PASSWORD_LENGTH ||
      !/[A-Za-z]/.test(password) ||
      !/\d/.test(password)
    ) {
      return left(
        new ValidationError(
          `Password must be at least ${MIN_PASSWORD_LENGTH} characters and contain a letter and a digit`,
          'password',
        ),
      );
    }
    return right(undefined);
  }

  private async signIn(user: User): Promise<AuthResultDto> {
    const issued = await this.tokenService.issue({
      sub: user.id.toString(),
      email: user.email.toString(),
      roles: user.roles,
    });

    return {
      token: issued.token,
      expiresAt: issued.expiresAt,
      user: toUserOutput(user),
    };
  }
}
