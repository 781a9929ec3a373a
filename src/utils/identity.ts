export const ADMIN_ID = "ADMIN";

// User ids are stored upper-cased, so "alice" and "ALICE" are the same account
export const normalizeUserId = (id: string): string => id.trim().toUpperCase();

// Spaces and single quotes are not allowed anywhere in an id
export const isValidUserId = (id: string): boolean =>
  id.trim().length > 0 && !id.includes(" ") && !id.includes("'");
