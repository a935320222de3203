import { defineEntity } from '../../src/mapping/entity.js';

export interface Person {
  id: number;
  name: string;
  email: string;
  age: number;
  city: string;
  active: boolean | null;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

export const personEntity = defineEntity<Person>({
  kind: 'Person',
  idProperty: 'id',
  fields: {
    id: 'id',
    name: 'full_name',
    email: 'email',
    age: 'age',
    city: 'city',
    active: 'active',
  },
  hydrate: (values) => {
    const active = values['active'];
    return {
      id: numberOr(values['id'], 0),
      name: stringOr(values['name'], ''),
      email: stringOr(values['email'], ''),
      age: numberOr(values['age'], 0),
      city: stringOr(values['city'], ''),
      active: typeof active === 'boolean' ? active : null,
    };
  },
});

export function makePerson(overrides: Partial<Person> = {}): Person {
  return {
    id: 1,
    name: 'Ada',
    email: 'ada@example.com',
    age: 30,
    city: 'Paris',
    active: null,
    ...overrides,
  };
}
