import { Barista, Category, Customer, User } from '@domain/entities';
import { Email, EntityId, isUserRole } from '@domain/value-objects';
import { BaristaDocument, CategoryDocument, CustomerDocument, UserDocument } from '../schemas';

/**
 * Mappers for the reference data kept next to orders and menu items.
 */
export class CategoryMapper {
  static toDomain(document: CategoryDocument): Category {
    return Category.reconstitute({
      id: EntityId.fromString('category', document._id),
      name: document.name,
      description: document.description ?? null,
      createdAt: document.createdAt,
    });
  }

  static toDocument(category: Category): CategoryDocument {
    const document = new CategoryDocument();
    document._id = category.id.toString();
    document.name = category.name;
    document.normalizedName = category.name.trim().toLowerCase();
    document.description = category.description;
    document.createdAt = category.createdAt;
    return document;
  }
}

export class CustomerMapper {
  static toDomain(document: CustomerDocument): Customer {
    return Customer.reconstitute({
      id: EntityId.fromString('customer', document._id),
      name: document.name,
      email: Email.fromString(document.email),
      phone: document.phone ?? null,
      address: document.address ?? null,
      userId: document.userId ? EntityId.fromString('user', document.userId) : null,
      createdAt: document.createdAt,
    });
  }

  static toDocument(customer: Customer): CustomerDocument {
    const document = new CustomerDocument();
    document._id = customer.id.toString();
    document.name = customer.name;
    document.email = customer.email.toString();
    document.phone = customer.phone;
    document.address = customer.address;
    document.userId = customer.userId?.toString() ?? null;
    document.createdAt = customer.createdAt;
    return document;
  }
}

export class BaristaMapper {
  static toDomain(document: BaristaDocument): Barista {
    return Barista.reconstitute({
      id: EntityId.fromString('barista', document._id),
      userId: EntityId.fromString('user', document.userId),
      name: document.name,
      isActive: document.isActive,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt ?? null,
    });
  }

  static toDocument(barista: Barista): BaristaDocument {
    const document = new BaristaDocument();
    document._id = barista.id.toString();
    document.userId = barista.userId.toString();
    document.name = barista.name;
    document.isActive = barista.isActive;
    document.createdAt = barista.createdAt;
    document.updatedAt = barista.updatedAt;
    return document;
  }
}

export class UserMapper {
  // Unknown role strings are dropped rather than trusted
  static toDomain(document: UserDocument): User {
    return User.reconstitute({
      id: EntityId.fromString('user', document._id),
      email: Email.fromString(document.email),
      passwordHash: document.passwordHash,
      firstName: document.firstName,
      lastName: document.lastName,
      phoneNumber: document.phoneNumber ?? null,
      roles: document.roles.filter(isUserRole),
      isActive: document.isActive,
      createdAt: document.createdAt,
    });
  }

  static toDocument(user: User): UserDocument {
    const document = new UserDocument();
    document._id = user.id.toString();
    document.email = user.email.toString();
    document.passwordHash = user.passwordHash;
    document.firstName = user.firstName;
    document.lastName = user.lastName;
    document.phoneNumber = user.phoneNumber;
    document.roles = [...user.roles];
    document.isActive = user.isActive;
    document.createdAt = user.createdAt;
    return document;
  }
}
