// ─── Identifiers ─────────────────────────────────────────────────────────────

/**
 * Handle into a function's name table, e.g. `3` for `v3`.
 * Parameters occupy the first handles of every function.
 */
export type LocalId = number;

/** Function ordinal: `2` for `f2`. Calls only go from lower to higher ordinals. */
export type FuncOrdinal = number;
