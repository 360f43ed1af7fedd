import { Customer } from '@domain/entities';
import { CustomerId } from '@domain/value-objects';

export interface ICustomerRepositoryPort {
  save(customer: Customer): Promise<void>;
  findById(id: CustomerId): Promise<Customer | null>;

  /**
   * @param email - compared lower-cased
   */
  findByEmail(email: string): Promise<Customer | null>;

  /**
   * Lists customers sorted by name.
   */
  findAll(): Promise<Customer[]>;
}
