import { Email } from '@domain/value-objects';

describe('Email', () => {
  it('should store addresses trimmed and lower-cased', () => {
    expect(Email.fromString('  Ana.Ruiz@Example.COM ').toString()).toBe('ana.ruiz@example.com');
  });

  it('should reject malformed addresses', () => {
    expect(() => Email.fromString('not-an-email')).toThrow(
      'Invalid email: "not-an-email" is not a valid address',
    );
  });

  it('should reject empty addresses', () => {
    expect(() => Email.fromString(' ')).toThrow('Invalid email: cannot be empty');
  });
});
