import { EntityMetadata, optionalText, requireText } from '../common';
import { CustomerId, Email, EntityId, UserId } from '../value-objects';

/**
 * A person orders are placed for. May be linked to a login account.
 */
export class Customer {
  static readonly MAX_NAME_LENGTH = 100;
  static readonly MAX_PHONE_LENGTH = 20;
  static readonly MAX_ADDRESS_LENGTH = 500;

  private constructor(
    private readonly meta: EntityMetadata<'customer'>,
    public readonly name: string,
    public readonly email: Email,
    public readonly phone: string | null,
    public readonly address: string | null,
    public readonly userId: UserId | null,
  ) {}

  static create(props: {
    id?: CustomerId;
    name: string;
    email: string;
    phone?: string | null;
    address?: string | null;
    userId?: UserId | null;
  }): Customer {
    return new Customer(
      EntityMetadata.create(props.id ?? EntityId.generate('customer')),
      requireText('Customer', 'name', props.name, Customer.MAX_NAME_LENGTH),
      Email.fromString(props.email),
      optionalText('Customer', 'phone', props.phone, Customer.MAX_PHONE_LENGTH),
      optionalText('Customer', 'address', props.address, Customer.MAX_ADDRESS_LENGTH),
      props.userId ?? null,
    );
  }

  static reconstitute(props: {
    id: CustomerId;
    name: string;
    email: Email;
    phone: string | null;
    address: string | null;
    userId: UserId | null;
    createdAt: Date;
  }): Customer {
    return new Customer(
      EntityMetadata.reconstitute({
        id: props.id,
        createdAt: props.createdAt,
        updatedAt: null,
        version: 1,
      }),
      props.name,
      props.email,
      props.phone,
      props.address,
      props.userId,
    );
  }

  get id(): CustomerId {
    return this.meta.id;
  }

  get createdAt(): Date {
    return this.meta.createdAt;
  }

  equals(other: Customer): boolean {
    return this.id.equals(other.id);
  }
}
