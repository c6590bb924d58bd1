// ── Frame cell code contract ──
// The renderer decodes these bit-exactly. Bump FRAME_FORMAT_VERSION on any change.

/** Version of the frame cell code layout below. */
export const FRAME_FORMAT_VERSION = 1;

/** Number of depth buckets (0 = farthest, BUCKETS - 1 = nearest). */
export const BUCKETS = 8;

/** Glyph variants along a droplet trail, head first. */
export const TRAILS = 4;

/** Glyph variants available to a splash. */
export const SPLASH_CHARS = 8;

/** Size variants available to a stream. */
export const STREAM_SIZES = 4;

/** First droplet code (0 is the empty cell). */
export const DROPLET_BASE = 1;

/** First splash code. */
export const SPLASH_BASE = DROPLET_BASE + BUCKETS * TRAILS;

/** First stream code. */
export const STREAM_BASE = SPLASH_BASE + BUCKETS * SPLASH_CHARS;

/** One past the last stream code. */
export const CODE_END = STREAM_BASE + BUCKETS * STREAM_SIZES;

// ── Pool capacities ──

export const MAX_DROPS = 3000;
export const MAX_SPLASHES = 200;
export const MAX_STREAMS = 500;

// ── Packed scene values ──

/** Packed i8 normal/flow value that represents 1.0. */
export const PACKED_UNIT = 127;

/** Largest scene depth value. */
export const DEPTH_MAX = 255;

/** Screen columns per extra expected droplet spawn. */
export const SPAWN_COLUMNS_PER_DROP = 64;

/** Splash drift is kept within ±MAX_DRIFT cells. */
export const MAX_DRIFT = 2;

/** Fixed host tick rate in Hz. */
export const TICK_RATE = 30;
