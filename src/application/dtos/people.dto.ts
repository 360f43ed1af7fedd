import { Barista, Customer } from '@domain/entities';

export interface RegisterCustomerInputDto {
  readonly name: string;
  readonly email: string;
  readonly phone?: string;
  readonly address?: string;
}

export interface CreateBaristaInputDto {
  /** Login account the barista works under */
  readonly userId: string;
  readonly name: string;
}

export interface SetBaristaActiveInputDto {
  readonly baristaId: string;
  readonly isActive: boolean;
}

export interface ListBaristasInputDto {
  readonly activeOnly?: boolean;
}

export interface CustomerOutputDto {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
  readonly address: string | null;
  readonly userId: string | null;
  readonly createdAt: Date;
}

export interface BaristaOutputDto {
  readonly id: string;
  readonly userId: string;
  readonly name: string;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date | null;
}

export const toCustomerOutput = (customer: Customer): CustomerOutputDto => ({
  id: customer.id.toString(),
  name: customer.name,
  email: customer.email.toString(),
  phone: customer.phone,
  address: customer.address,
  userId: customer.userId?.toString() ?? null,
  createdAt: customer.createdAt,
});

export const toBaristaOutput = (barista: Barista): BaristaOutputDto => ({
  id: barista.id.toString(),
  userId: barista.userId.toString(),
  name: barista.name,
  isActive: barista.isActive,
  createdAt: barista.createdAt,
  updatedAt: barista.updatedAt,
});
