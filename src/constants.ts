export const APP_NAME = "commitwright";
export const APP_URL = "https://www.npmjs.com/package/commitwright";
export const CONFIG_FILE = ".commitwrightrc";

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 500;
export const DEFAULT_TIMEOUT_MS = 60_000;

export const DESCRIPTION_FALLBACK_LENGTH = 50;
