import { DatastoreDataError, DatastoreRepository } from '../../src/index.js';
import type { DatastoreOperations } from '../../src/index.js';
import { personEntity, type Person } from './domain/person.js';

export const PEOPLE_QUERIES = {
  adultsWithoutStatus: 'findByAgeGreaterThanAndActiveIsNull',
  countInCity: 'countByCityEquals',
  exists: 'existsByIdEquals',
  oldestInCity: 'findTop3ByCityOrderByAgeDescNameAsc',
} as const;

export interface PersonSummary {
  name: string;
  age: number;
}

export interface PeopleRepository {
  save(person: Person): Promise<void>;
  /** minAge is optional only so the adults route can show the TooFewArgumentsError path (400). */
  adultsWithoutStatus(minAge?: number): Promise<Person[]>;
  countInCity(city: string): Promise<number>;
  exists(id: string): Promise<boolean>;
  oldestInCity(city: string): Promise<PersonSummary[]>;
}

export function createPeopleRepository(operations: DatastoreOperations): PeopleRepository {
  const repository = new DatastoreRepository<Person>({ operations, entity: personEntity }).prepare(
    PEOPLE_QUERIES.adultsWithoutStatus,
    PEOPLE_QUERIES.countInCity,
    PEOPLE_QUERIES.exists,
  );
  const oldest = repository.projected(
    PEOPLE_QUERIES.oldestInCity,
    (person): PersonSummary => ({ name: person.name, age: person.age }),
  );

  return {
    save: (person) => repository.save(person),
    adultsWithoutStatus: (minAge) =>
      repository.find(PEOPLE_QUERIES.adultsWithoutStatus, ...(minAge === undefined ? [] : [minAge])),
    countInCity: (city) => repository.count(PEOPLE_QUERIES.countInCity, city),
    exists: (id) => repository.exists(PEOPLE_QUERIES.exists, id),
    oldestInCity: async (city) => {
      const result = await oldest.execute([city]);
      if (!Array.isArray(result)) {
        throw new DatastoreDataError(`Query method ${oldest.methodName} does not return an entity list`);
      }
      return result;
    },
  };
}
