import { describe, it, expect } from 'vitest';
import { DatastoreDataError } from '../../../src/index.js';
import { personIdFromEmail } from '../../src/domain/ids.js';
import { personEntity } from '../../src/domain/person.js';

describe('personEntity', () => {
  it('hydrates a stored document', () => {
    const person = personEntity.fromProperties({
      id: 'p-1',
      name: 'Ada',
      email: 'ada@example.com',
      age: 30,
      city: 'Paris',
      active: true,
    });
    expect(person).toEqual({ id: 'p-1', name: 'Ada', email: 'ada@example.com', age: 30, city: 'Paris', active: true });
  });

  it('treats a missing active flag as null', () => {
    const person = personEntity.fromProperties({ id: 'p-1', name: 'Ada', email: 'a@b.c', age: 30, city: 'Paris' });
    expect(person.active).toBeNull();
  });

  it('rejects documents that do not match the schema', () => {
    expect(() => personEntity.fromProperties({ id: 'p-1', name: 'Ada', age: 'thirty' })).toThrow(DatastoreDataError);
  });
});

describe('personIdFromEmail', () => {
  it('is stable across case and whitespace', () => {
    expect(personIdFromEmail(' Ada@Example.com ')).toBe(personIdFromEmail('ada@example.com'));
  });

  it('differs between emails', () => {
    expect(personIdFromEmail('ada@example.com')).not.toBe(personIdFromEmail('bob@example.com'));
  });
});
