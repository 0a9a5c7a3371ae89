export type GameMode = 'normal' | 'ironman' | 'island' | 'bingo' | string;

export interface Identity {
  handle: string; // Canonical username as returned by the lookup
  stableId: string; // Dashed UUID
}

export interface ProfileSummary {
  profileId: string;
  displayName: string;
  mode: GameMode;
  lastUpdate: number; // Member last_save, epoch millis (0 when unknown)
  isSelected: boolean; // Most recently saved profile, best-effort
  raw: HypixelProfile;
}

export interface PlanEntry {
  endpoint: string; // Template with {uuid} / {profileId} placeholders
  outputFile: string;
  description: string;
}

export type ExtractionOutcome = 'success' | 'failure';

export interface ExtractionResult {
  endpoint: string;
  outputFile: string;
  outcome: ExtractionOutcome;
  error?: string;
}

export interface ExtractionSummary {
  successCount: number;
  totalCount: number;
  outputs: string[];
  results: ExtractionResult[];
}

// Raw API shapes. Only the fields the pipeline reads are typed.

export interface MojangProfileResponse {
  id: string;
  name: string;
}

export interface HypixelMember {
  last_save?: number;
  [key: string]: unknown;
}

export interface HypixelProfile {
  profile_id: string;
  cute_name?: string;
  game_mode?: string;
  members?: Record<string, HypixelMember>;
  [key: string]: unknown;
}

export interface HypixelProfilesResponse {
  success: boolean;
  profiles?: HypixelProfile[] | null;
}

export interface ExtractorConfig {
  hypixelApiBase: string;
  mojangApiBase: string;
  apiKey?: string;
  apiKeyFile: string;
  outputRoot: string;
  userAgent: string;
  requestDelayMs: number;
  requestTimeoutMs: number;
  maxAttempts: number;
}
