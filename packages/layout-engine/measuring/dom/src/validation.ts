import { PipelineError, fontKeyToString, type FontKey } from '@linewright/contracts';

/**
 * Reject keys no backend can render: sizes must be positive integers.
 * A document can drive the size below zero with enough `small` tags.
 */
export function assertSupportedKey(key: FontKey): void {
  if (!Number.isInteger(key.size) || key.size <= 0) {
    throw new PipelineError('FONT_UNAVAILABLE', `Unsupported font size ${key.size} (${fontKeyToString(key)})`, {
      key,
    });
  }
}
