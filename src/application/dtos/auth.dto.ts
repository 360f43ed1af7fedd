import { User } from '@domain/entities';
import { UserRole } from '@domain/value-objects';

export interface RegisterInputDto {
  readonly email: string;

  /** At least 8 characters with one letter and one digit */
  readonly password: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phoneNumber?: string;
}

export interface LoginInputDto {
  readonly email: string;
  readonly password: string;
}

export interface UserOutputDto {
  readonly id: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phoneNumber: string | null;
  readonly roles: UserRole[];
  readonly isActive: boolean;
  readonly createdAt: Date;
}

export interface AuthResultDto {
  readonly token: string;
  readonly expiresAt: Date;
  readonly user: UserOutputDto;
}

export const toUserOutput = (user: User): UserOutputDto => ({
  id: user.id.toString(),
  email: user.email.toString(),
  firstName: user.firstName,
  lastName: user.lastName,
  phoneNumber: user.phoneNumber,
  roles: [...user.roles],
  isActive: user.isActive,
  createdAt: user.createdAt,
});
