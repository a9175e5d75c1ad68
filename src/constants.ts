/** Maximum card text length; longer input is truncated. */
export const CARD_TEXT_MAX = 280;

/** Maximum board chat message length. */
export const CHAT_TEXT_MAX = 500;

/** Maximum direct message length. */
export const DM_TEXT_MAX = 1000;

/** Maximum group room message length. */
export const GROUP_TEXT_MAX = 800;

/** Card tag length */
export const TAG_MAX = 16;

/** Author and display-name length */
export const AUTHOR_MAX = 32;

/** Name a client announces when joining a board */
export const CLIENT_NAME_MAX = 24;

export const CHANNEL_MAX = 32;

export const EMOJI_MAX = 16;

export const TITLE_MAX = 80;

/** Messages loaded into a board or DM snapshot */
export const SNAPSHOT_MESSAGE_LIMIT = 200;

/** Messages loaded into a group room history */
export const GROUP_HISTORY_LIMIT = 120;

/** Activity and presence-history entries in a board snapshot */
export const SNAPSHOT_ACTIVITY_LIMIT = 25;

/** Activity entries served by the HTTP activity feed */
export const ACTIVITY_FEED_LIMIT = 50;

/** Search results per kind */
export const SEARCH_RESULT_LIMIT = 20;

export const DEFAULT_CHANNEL = 'general';

export const DEFAULT_BOARD_TITLE = 'Untitled';

/** Title applied when a client clears the board title */
export const FALLBACK_BOARD_TITLE = 'Team Board';

export const DEFAULT_THEME = 'ocean';

export const DEFAULT_ACCENT_COLOR = '#38bdf8';

export const DEFAULT_BACKGROUND_ANIMATION = 'aurora';

/** Themes a board may switch to at runtime */
export const BOARD_THEMES = ['ocean', 'mint', 'sunset', 'violet', 'slate'] as const;

/** Fallback name for anonymous authors */
export const ANONYMOUS_NAME = 'Anon';

/** Colors assigned to connections that send a cursor without one */
export const USER_COLORS = [
  '#FF6B6B', '#4ECDC4', '#45B7D1', '#96CEB4',
  '#FFEAA7', '#DDA0DD', '#98D8C8', '#F7DC6F',
  '#BB8FCE', '#85C1E9', '#F0B27A', '#82E0AA',
];
