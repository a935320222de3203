import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Person } from '../../domain/person.js';
import { personIdFromEmail } from '../../domain/ids.js';
import type { PeopleRepository } from '../../repository.js';

const createPersonBody = z.object({
  name: z.string().min(1),
  email: z.string().email(),
  age: z.number().int().nonnegative(),
  city: z.string().min(1),
  active: z.boolean().nullable().optional(),
});

const adultsQuery = z.object({
  minAge: z
    .string()
    .regex(/^-?\d+$/, 'minAge must be an integer')
    .transform(Number)
    .optional(),
});

const cityQuery = z.object({ city: z.string().min(1) });

const idParams = z.object({ id: z.string().min(1) });

export async function registerPeopleRoutes(app: FastifyInstance, people: PeopleRepository): Promise<void> {
  // POST /people: create or replace a person
  app.post('/people', async (request, reply) => {
    const body = createPersonBody.parse(request.body);
    const person: Person = {
      id: personIdFromEmail(body.email),
      name: body.name,
      email: body.email,
      age: body.age,
      city: body.city,
      active: body.active ?? null,
    };
    await people.save(person);
    return reply.status(201).send(person);
  });

  // GET /people/adults?minAge=: older than minAge, no active flag recorded
  app.get('/people/adults', async (request, reply) => {
    const { minAge } = adultsQuery.parse(request.query);
    return reply.status(200).send(await people.adultsWithoutStatus(minAge));
  });

  app.get('/people/count', async (request, reply) => {
    const { city } = cityQuery.parse(request.query);
    return reply.status(200).send({ city, count: await people.countInCity(city) });
  });

  app.get('/people/oldest', async (request, reply) => {
    const { city } = cityQuery.parse(request.query);
    return reply.status(200).send(await people.oldestInCity(city));
  });

  app.get('/people/:id/exists', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    return reply.status(200).send({ id, exists: await people.exists(id) });
  });
}
