/**
 * Capabilities a transport's token is requested for.
 * @module types/action
 */

import { z } from 'zod';
import { BadStateError } from '../errors.js';

/**
 * Scope actions. `Push` implies pull; `Delete` shares the push scope,
 * which is the read/write grant.
 */
export const Action = {
  Pull: 'pull',
  Push: 'push,pull',
  Delete: 'push,pull',
  Catalog: 'catalog',
} as const;

export type Action = (typeof Action)[keyof typeof Action];

/**
 * Distinct action values.
 */
export const ACTIONS = [Action.Pull, Action.Push, Action.Catalog] as const;

const actionSchema = z.enum(ACTIONS);

/**
 * Returns the value as an Action, or throws BadStateError.
 */
export function parseAction(value: string): Action {
  const result = actionSchema.safeParse(value);
  if (!result.success) {
    throw new BadStateError(`Invalid action supplied to RegistryTransport: ${value}`);
  }
  return result.data;
}

export function isAction(value: string): value is Action {
  return actionSchema.safeParse(value).success;
}
