export const isoNow = (): string => new Date().toISOString();

/** Current time in whole seconds since the epoch. */
export const unixNow = (): number => Math.floor(Date.now() / 1000);
