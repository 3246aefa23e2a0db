export const isoNow = (): string => new Date().toISOString();

export const DAY_SECONDS = 24 * 60 * 60;
