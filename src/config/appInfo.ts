export const APP_NAME = 'SkyBlock Profile Extractor';
export const VERSION = '1';

/** Sent on every request to both services. */
export const USER_AGENT = `SkyBlock-Profile-Extractor/${VERSION}`;
