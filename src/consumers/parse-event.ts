import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';

/** Turns a decoded message body into a validated event, or throws. */
export async function parseEvent<T extends object>(type: ClassConstructor<T>, payload: unknown): Promise<T> {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new Error(`${type.name} payload must be an object`);
  }

  const event = plainToInstance(type, payload);
  const errors = await validate(event);
  if (errors.length > 0) {
    const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid ${type.name}: ${details.join('; ')}`);
  }
  return event;
}
