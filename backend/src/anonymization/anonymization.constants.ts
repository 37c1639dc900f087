export const DEFAULT_HASH_ROUNDS = 30000;
export const DEFAULT_LABEL_LENGTH = 12;
export const MIN_LABEL_LENGTH = 8;
// shipping_addresses.phone_number is VARCHAR(50) and the label carries the 5-char prefix
export const MAX_LABEL_LENGTH = 45;

// 256 bits
export const MIN_SALT_BYTES = 32;
