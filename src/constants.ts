// e621 API
export const E621_BASE_URL = 'https://e621.net';
export const E621_POSTS_ENDPOINT = `${E621_BASE_URL}/posts.json`;
export const E621_MAX_LIMIT = 320;

// Fixed part of every search: animated posts above a minimum score
export const BASE_SEARCH_TAGS = ['animated', 'score:>30'] as const;
export const LOOKBACK_HOURS = 24;

export const APP_NAME = 'e621-relay';
export const APP_VERSION = process.env.npm_package_version || '1.0.0';

// Extensions Telegram cannot stream as video; these are transcoded to MP4 first
export const CONVERTIBLE_EXTENSIONS: ReadonlySet<string> = new Set(['webm']);
export const TRANSCODED_EXTENSION = 'mp4';

export const MAX_UPLOAD_SIZE = 50 * 1024 * 1024; // 50MB Telegram bot upload limit

// Timeouts
export const FETCH_TIMEOUT_MS = 30_000;
export const DOWNLOAD_TIMEOUT_MS = 45_000;
export const TRANSCODE_TIMEOUT_MS = 180_000;

// Pipeline defaults (overridable through the environment)
export const DEFAULT_POST_DELAY_MS = 5_000;
export const DEFAULT_SEND_TIMEOUT_MS = 60_000;
export const DEFAULT_POLL_INTERVAL_MS = 20_000;
export const MAX_CATCHUP_MINUTES = 5;

// Caption
export const UNKNOWN_ARTIST = 'Unknown Artist';
export const NO_CHARACTER = 'No specific character';
export const TAG_LINE_MAX_LENGTH = 300;

// Default channels built from the environment
export const DEFAULT_CHANNEL_NAME = 'daily';
export const DEFAULT_CHANNEL_TIME = '00:00';
export const OFFSET_CHANNEL_NAME = 'offset';
export const OFFSET_CHANNEL_TIME = '12:00';
export const DEFAULT_BLACKLIST_FILE = 'blacklist.json';
