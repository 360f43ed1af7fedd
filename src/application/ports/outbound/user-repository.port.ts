import { User } from '@domain/entities';
import { UserId } from '@domain/value-objects';

export interface IUserRepositoryPort {
  save(user: User): Promise<void>;
  findById(id: UserId): Promise<User | null>;

  /**
   * @param email - compared lower-cased
   */
  findByEmail(email: string): Promise<User | null>;
}
