export const ANON_LABEL_PREFIX = 'anon_';
export const ANON_EMAIL_DOMAIN = 'example.invalid';

export interface PersonalFields {
  email: string | null;
  firstName: string | null;
  lastName: string | null;
  username: string | null;
}

/**
 * Joins the personal fields and the salt in a fixed order with `|`, so that
 * ("ab", "c") and ("a", "bc") never hash to the same label.
 */
export function buildLabelSource(fields: PersonalFields, saltHex: string): string {
  return [fields.email, fields.firstName, fields.lastName, fields.username]
    .map(value => value ?? '')
    .concat(saltHex)
    .join('|');
}

export function deriveAnonLabel(digest: string, length: number): string {
  return ANON_LABEL_PREFIX + digest.slice(0, length);
}

export function anonEmail(label: string): string {
  return `${label}@${ANON_EMAIL_DOMAIN}`;
}
