import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import { AuthResultDto, LoginInputDto, RegisterInputDto, UserOutputDto } from '@application/dtos';

export interface IAuthPort {
  /**
   * Creates a customer account and its customer profile, then signs it in.
   */
  register(input: RegisterInputDto): Promise<Either<ApplicationError, AuthResultDto>>;

  login(input: LoginInputDto): Promise<Either<ApplicationError, AuthResultDto>>;

  getCurrentUser(userId: string): Promise<Either<ApplicationError, UserOutputDto>>;
}
