import {
  AppError,
  CapacityExceededError,
  ConflictError,
  NotFoundError,
} from '../errors';
import type { RegistrationRecord } from '../models/registration';
import type { DataStore } from '../store/types';

export type RegistrationRejection =
  | 'EVENT_NOT_FOUND'
  | 'ALREADY_REGISTERED'
  | 'EVENT_FULL';

export type RegistrationOutcome =
  | { status: 'registered'; registration: RegistrationRecord }
  | { status: 'rejected'; reason: RegistrationRejection };

export type UnregistrationOutcome =
  | { status: 'unregistered'; registration: RegistrationRecord }
  | { status: 'rejected'; reason: 'REGISTRATION_NOT_FOUND' };

/**
 * Registers the user for the event. The existence, uniqueness and capacity
 * checks and the insert share one store transaction, so concurrent attempts
 * for the last seat leave at most one winner.
 */
export async function register(store: DataStore, userId: string, eventId: number): Promise<RegistrationOutcome> {
  try {
    return await store.transact(async (tx): Promise<RegistrationOutcome> => {
      const event = await tx.getEvent(eventId);
      if (!event) {
        return { status: 'rejected', reason: 'EVENT_NOT_FOUND' };
      }

      const existing = await tx.findRegistration(userId, eventId);
      if (existing) {
        return { status: 'rejected', reason: 'ALREADY_REGISTERED' };
      }

      if (event.capacity !== null) {
        const count = await tx.countRegistrations(eventId);
        if (count >= event.capacity) {
          return { status: 'rejected', reason: 'EVENT_FULL' };
        }
      }

      const registration = await tx.insertRegistration(userId, eventId);
      return { status: 'registered', registration };
    });
  } catch (error) {
    if (error instanceof ConflictError) {
      return { status: 'rejected', reason: 'ALREADY_REGISTERED' };
    }
    throw error;
  }
}

export async function unregister(store: DataStore, userId: string, eventId: number): Promise<UnregistrationOutcome> {
  return store.transact(async (tx): Promise<UnregistrationOutcome> => {
    const registration = await tx.findRegistration(userId, eventId);
    if (!registration) {
      return { status: 'rejected', reason: 'REGISTRATION_NOT_FOUND' };
    }
    await tx.deleteRegistration(registration);
    return { status: 'unregistered', registration };
  });
}

export async function listEventRegistrations(store: DataStore, eventId: number): Promise<RegistrationRecord[]> {
  const event = await store.getEvent(eventId);
  if (!event) {
    throw new NotFoundError('Event not found');
  }
  return store.listRegistrations(eventId);
}

export function rejectionToError(reason: RegistrationRejection | 'REGISTRATION_NOT_FOUND'): AppError {
  switch (reason) {
    case 'EVENT_NOT_FOUND':
      return new NotFoundError('Event not found');
    case 'REGISTRATION_NOT_FOUND':
      return new NotFoundError('Registration not found');
    case 'ALREADY_REGISTERED':
      return new ConflictError('User already registered for this event', 'ALREADY_REGISTERED');
    case 'EVENT_FULL':
      return new CapacityExceededError();
  }
}
