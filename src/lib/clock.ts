// Timestamps are ISO-8601 UTC with millisecond precision, which SQLite
// compares lexicographically.

export type Clock = () => string;

export const systemClock: Clock = () => new Date().toISOString();
