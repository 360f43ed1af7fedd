import { EntityMetadata, optionalText, requireText } from '../common';
import { ValidationException } from '../exceptions';
import { Email, EntityId, UserId, UserRole } from '../value-objects';

/**
 * Login account. Only the password hash is ever held.
 */
export class User {
  static readonly MAX_NAME_LENGTH = 100;
  static readonly MAX_PHONE_LENGTH = 20;

  private constructor(
    private readonly meta: EntityMetadata<'user'>,
    public readonly email: Email,
    public readonly passwordHash: string,
    public readonly firstName: string,
    public readonly lastName: string,
    public readonly phoneNumber: string | null,
    private readonly _roles: readonly UserRole[],
    private _isActive: boolean,
  ) {}

  static create(props: {
    id?: UserId;
    email: string;
    passwordHash: string;
    firstName: string;
    lastName: string;
    phoneNumber?: string | null;
    roles: readonly UserRole[];
  }): User {
    if (!props.passwordHash) {
      throw new ValidationException('User', 'password hash cannot be empty', 'password');
    }
    if (props.roles.length === 0) {
      throw new ValidationException('User', 'must have at least one role', 'roles');
    }
    return new User(
      EntityMetadata.create(props.id ?? EntityId.generate('user')),
      Email.fromString(props.email),
      props.passwordHash,
      requireText('User', 'firstName', props.firstName, User.MAX_NAME_LENGTH),
      requireText('User', 'lastName', props.lastName, User.MAX_NAME_LENGTH),
      optionalText('User', 'phoneNumber', props.phoneNumber, User.MAX_PHONE_LENGTH),
      [...new Set(props.roles)],
      true,
    );
  }

  static reconstitute(props: {
    id: UserId;
    email: Email;
    passwordHash: string;
    firstName: string;
    lastName: string;
    phoneNumber: string | null;
    roles: readonly UserRole[];
    isActive: boolean;
    createdAt: Date;
  }): User {
    return new User(
      EntityMetadata.reconstitute({
        id: props.id,
        createdAt: props.createdAt,
        updatedAt: null,
        version: 1,
      }),
      props.email,
      props.passwordHash,
      props.firstName,
      props.lastName,
      props.phoneNumber,
      [...props.roles],
      props.isActive,
    );
  }

  get id(): UserId {
    return this.meta.id;
  }

  get roles(): readonly UserRole[] {
    return [...this._roles];
  }

  get isActive(): boolean {
    return this._isActive;
  }

  get createdAt(): Date {
    return this.meta.createdAt;
  }

  hasRole(role: UserRole): boolean {
    return this._roles.includes(role);
  }

  deactivate(): void {
    this._isActive = false;
  }

  equals(other: User): boolean {
    return this.id.equals(other.id);
  }
}
