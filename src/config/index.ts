import { env } from './env.js';

export { env };

/** Rule file `export` falls back to when no --exif option is given. */
export const defaultRulesPath = (): string | undefined => env.PHOTO_TOOLS_EXIF_RULES;
