import { TransformFnParams } from 'class-transformer';

/**
 * Accepts tags as a JSON array, repeated form fields or a single
 * comma-separated string.
 */
export function toTagList({ value }: TransformFnParams): unknown {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  }
  return value;
}
