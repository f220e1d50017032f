import { Transform } from 'class-transformer';

/**
 * Query strings arrive as text, so `'false'` must become `false` rather than a
 * truthy string. Anything that is not a recognizable boolean is passed through
 * for `@IsBoolean()` to reject.
 */
export function ToBoolean(): PropertyDecorator {
  return Transform(({ value }: { value: unknown }) => {
    if (typeof value === 'boolean') return value;
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    return value;
  });
}
