import type { HypixelMember, HypixelProfile, Identity, ProfileSummary } from '../../types';
import { NoProfilesError, isRecord } from '../../utils/errorHandler';
import { toDashedUuid, toUndashedUuid } from './identityResolver';
import type { JsonCaller } from './rateLimitedCaller';

/**
 * Look up a player's member record. The API keys `members` by the undashed
 * UUID, but dashed keys show up too, so both forms are tried.
 */
export function findMember(
  members: Record<string, HypixelMember> | undefined,
  stableId: string
): HypixelMember | undefined {
  if (!members) return undefined;

  const undashed = toUndashedUuid(stableId);
  const dashed = toDashedUuid(undashed);

  for (const key of [undashed, dashed]) {
    if (Object.prototype.hasOwnProperty.call(members, key) && isRecord(members[key])) {
      return members[key];
    }
  }
  return undefined;
}

function isProfile(value: unknown): value is HypixelProfile {
  return isRecord(value) && typeof value.profile_id === 'string';
}

function summarize(profile: HypixelProfile, stableId: string): ProfileSummary {
  const member = findMember(isRecord(profile.members) ? profile.members : undefined, stableId);
  const lastSave = member?.last_save;

  return {
    profileId: profile.profile_id,
    displayName: typeof profile.cute_name === 'string' ? profile.cute_name : profile.profile_id,
    mode: typeof profile.game_mode === 'string' ? profile.game_mode : 'normal',
    lastUpdate: typeof lastSave === 'number' && Number.isFinite(lastSave) ? lastSave : 0,
    isSelected: false,
    raw: profile
  };
}

/**
 * Order profiles by last save, newest first, and flag the newest one as
 * selected. The API does not say which profile is active; the most recently
 * saved one is a best guess.
 */
export function rankProfiles(profiles: ProfileSummary[]): ProfileSummary[] {
  const ranked = [...profiles]
    .sort((a, b) => b.lastUpdate - a.lastUpdate)
    .map(profile => ({ ...profile, isSelected: false }));

  if (ranked.length > 0) {
    ranked[0].isSelected = true;
  }
  return ranked;
}

export class ProfileEnumerator {
  constructor(private readonly api: JsonCaller) {}

  async enumerate(identity: Identity): Promise<ProfileSummary[]> {
    const response = await this.api.call(
      `skyblock/profiles?uuid=${encodeURIComponent(identity.stableId)}`,
      'Profile lookup'
    );

    const rawProfiles = isRecord(response) && Array.isArray(response.profiles) ? response.profiles : [];
    const profiles = rawProfiles
      .filter(isProfile)
      .map(profile => summarize(profile, identity.stableId));

    if (profiles.length === 0) {
      throw new NoProfilesError(`${identity.handle} has no SkyBlock profiles`);
    }

    return rankProfiles(profiles);
  }
}
