/**
 * HTML helpers for operation descriptions
 */

const TAG_PATTERN = /<[a-zA-Z/!?][^>]*>/g;

/**
 * Remove HTML tags, repeating until nothing changes
 *
 * Removing one tag can join the halves of another ("<<b>p>" => "<p>"),
 * so a single pass is not enough.
 */
export function stripTags(value: string): string {
  let current = value;
  let next = current.replace(TAG_PATTERN, '');
  while (next !== current) {
    current = next;
    next = current.replace(TAG_PATTERN, '');
  }
  return next;
}
