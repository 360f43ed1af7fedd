import { Barista } from '@domain/entities';
import { BaristaId, UserId } from '@domain/value-objects';

export interface BaristaFilters {
  readonly activeOnly?: boolean;
}

export interface IBaristaRepositoryPort {
  save(barista: Barista): Promise<void>;
  findById(id: BaristaId): Promise<Barista | null>;
  findByUserId(userId: UserId): Promise<Barista | null>;
  findAll(filters?: BaristaFilters): Promise<Barista[]>;
}
