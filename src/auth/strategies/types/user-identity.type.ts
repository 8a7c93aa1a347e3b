/**
 * Authenticated caller, resolved from a verified token for an active user.
 */
export type UserIdentity = {
  id: string;
  email: string;
};

export function isUserIdentity(value: unknown): value is UserIdentity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'email' in value &&
    typeof value.email === 'string'
  );
}
