import { Category } from '@domain/entities';
import { CategoryId } from '@domain/value-objects';

export interface ICategoryRepositoryPort {
  save(category: Category): Promise<void>;
  findById(id: CategoryId): Promise<Category | null>;
  findByName(name: string): Promise<Category | null>;
  findAll(): Promise<Category[]>;
  deleteAll(): Promise<void>;
}
