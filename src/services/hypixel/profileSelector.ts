import { format } from 'date-fns';
import type { ProfileSummary } from '../../types';
import type { Reporter } from '../../utils/reporter';

/**
 * Asks the operator to pick from `profiles` (already ordered) and resolves
 * to a 1-based index.
 */
export type ProfileChooser = (profiles: ProfileSummary[]) => Promise<number>;

export interface SelectOptions {
  requestedName?: string;
  silent?: boolean;
  choose?: ProfileChooser;
  reporter?: Reporter;
}

export function formatProfileLabel(profile: ProfileSummary): string {
  const lastSave = profile.lastUpdate > 0 ? format(new Date(profile.lastUpdate), 'yyyy-MM-dd HH:mm:ss') : 'never';
  const marker = profile.isSelected ? ' (Selected)' : '';
  return `${profile.displayName} (${profile.mode}) - Last Save: ${lastSave}${marker}`;
}

function findByName(profiles: ProfileSummary[], name: string): ProfileSummary | undefined {
  return (
    profiles.find(p => p.displayName === name) ??
    profiles.find(p => p.displayName.toLowerCase() === name.toLowerCase())
  );
}

/**
 * Pick exactly one profile. A lone profile is returned as-is; otherwise an
 * exact (then case-insensitive) name match wins, then the operator's choice,
 * then the most recently saved profile.
 */
export async function selectProfile(
  profiles: ProfileSummary[],
  options: SelectOptions = {}
): Promise<ProfileSummary | null> {
  if (profiles.length === 0) return null;
  if (profiles.length === 1) return profiles[0];

  const { requestedName, silent = false, choose, reporter } = options;

  if (requestedName) {
    const match = findByName(profiles, requestedName);
    if (match) return match;

    reporter?.warning(`Profile '${requestedName}' not found. Available profiles:`);
    profiles.forEach((p, i) => reporter?.warning(`  ${i + 1}. ${p.displayName}`));
  }

  if (silent || !choose) {
    return profiles[0];
  }

  const index = await choose(profiles);
  return profiles[index - 1] ?? profiles[0];
}
