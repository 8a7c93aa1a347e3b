export type JwtPayloadType = {
  id: string;
  iat: number;
  exp: number;
};

export function isJwtPayload(value: unknown): value is JwtPayloadType {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    'exp' in value &&
    typeof value.exp === 'number'
  );
}
