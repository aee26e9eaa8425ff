/** Narrow unknown input to a non-empty string. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** 24 hex characters, the string form of a Mongo ObjectId. */
export function isHex24(value: string): boolean {
  return /^[0-9a-fA-F]{24}$/.test(value);
}
