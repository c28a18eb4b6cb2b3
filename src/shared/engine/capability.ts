import { z } from 'zod';
import { POSITION_CAPABILITIES, type PositionCapability } from '../types/position';
import { MissingCapabilityError } from './errors';

const operation = z.custom<(...args: never[]) => unknown>(
  (value) => typeof value === 'function',
  { message: 'operation must be a function' }
);

/**
 * Runtime shape of a searchable position. Methods inherited through the
 * prototype chain count, so class instances validate as expected.
 */
export const PositionCapabilitySchema = z.object({
  copy: operation,
  apply: operation,
  isTerminal: operation,
  evaluate: operation,
  legalMoves: operation,
});

/**
 * List the capability operations `value` does not provide. A value that
 * is not an object at all lacks every operation.
 */
export function findMissingCapabilities(value: unknown): PositionCapability[] {
  const result = PositionCapabilitySchema.safeParse(value);
  if (result.success) {
    return [];
  }

  const missing = new Set<PositionCapability>();
  for (const issue of result.error.issues) {
    const key = issue.path[0];
    const capability = POSITION_CAPABILITIES.find((name) => name === key);
    if (capability) {
      missing.add(capability);
    } else {
      return [...POSITION_CAPABILITIES];
    }
  }
  return POSITION_CAPABILITIES.filter((name) => missing.has(name));
}

/**
 * Throw a fatal MissingCapabilityError unless `value` provides every
 * operation the engine relies on.
 */
export function assertPositionCapability(value: unknown): void {
  const missing = findMissingCapabilities(value);
  if (missing.length > 0) {
    throw new MissingCapabilityError(missing, {
      receivedType: value === null ? 'null' : typeof value,
    });
  }
}
