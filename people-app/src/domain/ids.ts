import { v5 as uuidv5 } from 'uuid';

export const PERSON_NAMESPACE = '3b6f1e2a-8c4d-4f7a-9b2e-5d1c7a3f8e60';

/** Same email, same id: re-posting a person replaces the stored entity. */
export function personIdFromEmail(email: string): string {
  return uuidv5(email.toLowerCase().trim(), PERSON_NAMESPACE);
}
