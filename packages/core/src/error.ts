import type { JsonifibleObject } from '#json';

/**
 * converts any error caught in a try-catch block to a json-compatible format
 * suitable for log metadata
 *
 * errors keep their name, message and cause chain, plus a numeric `status`
 * when the error carries one (e.g. an api error)
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function jsonifyError(error: unknown): JsonifibleObject {
  if (error instanceof Error) {
    return {
      type: 'Error',
      name: error.name,
      message: error.message,
      ...('status' in error &&
        typeof error.status === 'number' && { status: error.status }),
      ...(error.cause !== undefined && { cause: jsonifyError(error.cause) }),
    };
  }

  switch (typeof error) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'undefined':
      return { type: typeof error, value: error };
    case 'bigint':
    case 'symbol':
      return { type: typeof error, value: String(error) };
    case 'function':
      return { type: 'function', name: error.name || 'anonymous' };
    default:
      return error === null
        ? { type: 'null', value: null }
        : { type: 'object', value: Object.prototype.toString.call(error) };
  }
}
