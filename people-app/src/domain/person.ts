import { z } from 'zod';
import { DatastoreDataError, defineEntity } from '../../../src/index.js';

export interface Person {
  id: string;
  name: string;
  email: string;
  age: number;
  city: string;
  active: boolean | null;
}

const storedPerson = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  age: z.number().int(),
  city: z.string(),
  active: z.boolean().nullable().default(null),
});

export const personEntity = defineEntity<Person>({
  kind: 'Person',
  idProperty: 'id',
  fields: {
    id: 'id',
    name: 'name',
    email: 'email',
    age: 'age',
    city: 'city',
    active: 'active',
  },
  hydrate: (values) => {
    const parsed = storedPerson.safeParse(values);
    if (!parsed.success) {
      throw new DatastoreDataError(`Stored Person does not match its schema: ${parsed.error.message}`);
    }
    return parsed.data;
  },
});
