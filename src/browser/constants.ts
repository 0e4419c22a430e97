// ── Layout constants ──────────────────────────────────────────────────────────

export const CHAR_W      = 8;
export const LINE_H      = 13;
export const CONTENT_PAD = 8;

// ── Widgets ───────────────────────────────────────────────────────────────────

/** Text inputs are this many character cells wide. */
export const INPUT_CHARS = 20;
/** Horizontal padding inside a button, in character cells per side. */
export const BUTTON_PAD_CHARS = 1;
