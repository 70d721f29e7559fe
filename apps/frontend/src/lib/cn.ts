/**
 * Conditional class name merger.
 *
 * Drops falsy entries and joins the rest with a space.
 */
export function cn(...classes: (string | false | null | undefined)[]): string {
  return classes.filter(Boolean).join(" ");
}
