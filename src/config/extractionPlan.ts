/**
 * Extraction plan
 * Every endpoint pulled for a selected profile, in order. The full profile
 * comes first as the primary artifact.
 */

import type { PlanEntry } from '../types';

export const EXTRACTION_PLAN: readonly PlanEntry[] = [
  { endpoint: 'skyblock/profile?profile={profileId}', outputFile: 'profile.json', description: 'Full Profile' },
  { endpoint: 'skyblock/museum?profile={profileId}', outputFile: 'museum.json', description: 'Museum Donations' },
  { endpoint: 'skyblock/garden?profile={profileId}', outputFile: 'garden.json', description: 'Garden Progress' },
  { endpoint: 'skyblock/auction?profile={profileId}', outputFile: 'auctions.json', description: 'Profile Auctions' },
  { endpoint: 'skyblock/bingo?uuid={uuid}', outputFile: 'bingo.json', description: 'Bingo Progress' },
  { endpoint: 'player?uuid={uuid}', outputFile: 'player.json', description: 'Network Player Stats' },
  { endpoint: 'guild?player={uuid}', outputFile: 'guild.json', description: 'Guild' },
  { endpoint: 'recentgames?uuid={uuid}', outputFile: 'recent_games.json', description: 'Recent Games' },
  { endpoint: 'status?uuid={uuid}', outputFile: 'status.json', description: 'Online Status' },
  { endpoint: 'skyblock/bazaar', outputFile: 'bazaar.json', description: 'Bazaar Prices' },
  { endpoint: 'skyblock/news', outputFile: 'news.json', description: 'SkyBlock News' },
  { endpoint: 'skyblock/firesales', outputFile: 'firesales.json', description: 'Fire Sales' },
  { endpoint: 'resources/skyblock/election', outputFile: 'election.json', description: 'Mayor Election' }
];

export interface PlanParams {
  uuid: string;
  profileId: string;
}

/** Fill `{uuid}` and `{profileId}` placeholders with URI-encoded values. */
export function renderEndpoint(template: string, params: PlanParams): string {
  return template
    .replace(/\{uuid\}/g, encodeURIComponent(params.uuid))
    .replace(/\{profileId\}/g, encodeURIComponent(params.profileId));
}
