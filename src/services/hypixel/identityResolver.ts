import type { Identity } from '../../types';
import { ApiError, AppError, NotFoundError, isRecord } from '../../utils/errorHandler';
import type { JsonCaller } from './rateLimitedCaller';

const USERNAME_PATTERN = /^[A-Za-z0-9_]{1,16}$/;
const UNDASHED_UUID = /^[0-9a-f]{32}$/i;
const DASHED_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Canonical dashed form of a player UUID:
 * abcdef0123456789abcdef0123456789 -> abcdef01-2345-6789-abcd-ef0123456789
 */
export function toDashedUuid(id: string): string {
  if (DASHED_UUID.test(id)) return id.toLowerCase();
  if (!UNDASHED_UUID.test(id)) {
    throw new AppError(`Malformed player UUID "${id}"`, 'INVALID_RESPONSE');
  }

  const hex = id.toLowerCase();
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20)
  ].join('-');
}

export const toUndashedUuid = (id: string): string => id.replace(/-/g, '').toLowerCase();

/**
 * Maps a Minecraft username to its UUID through the (unauthenticated)
 * Mojang profile lookup.
 */
export class IdentityResolver {
  constructor(private readonly lookup: JsonCaller) {}

  async resolve(handle: string): Promise<Identity> {
    const name = handle.trim();
    if (!USERNAME_PATTERN.test(name)) {
      throw new NotFoundError(`"${handle}" is not a valid Minecraft username`);
    }

    let response: unknown;
    try {
      response = await this.lookup.call(`users/profiles/minecraft/${encodeURIComponent(name)}`, 'UUID lookup');
    } catch (error) {
      if (error instanceof ApiError && error.lastError.statusCode === 404) {
        throw new NotFoundError(`Player "${name}" not found`);
      }
      throw error;
    }

    // Mojang has answered unknown names with 204 and an empty body
    if (!isRecord(response) || typeof response.id !== 'string') {
      throw new NotFoundError(`Player "${name}" not found`);
    }

    return {
      handle: typeof response.name === 'string' ? response.name : name,
      stableId: toDashedUuid(response.id)
    };
  }
}
