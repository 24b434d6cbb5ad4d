const DOCTYPE_PATTERN = /<!doctype[^>]*>/gi;
const INTER_TAG_WHITESPACE = />\s+</g;

/**
 * Light markup cleanup run before parsing: drops doctype declarations and
 * whitespace that only separates two tags. Text content is left alone.
 *
 * @example
 * normalizeMarkup('<!doctype html>\n<p>\n  <b>Hi</b>\n</p>');
 * // '<p><b>Hi</b></p>'
 */
export function normalizeMarkup(markup: string): string {
  return markup.replace(DOCTYPE_PATTERN, '').replace(INTER_TAG_WHITESPACE, '><').trim();
}
