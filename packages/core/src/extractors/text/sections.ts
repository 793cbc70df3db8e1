/**
 * Section boundary heuristic
 *
 * Headings in servicer statements are short and either end in a colon,
 * are all caps, or carry an explicit section marker.
 */

const MAX_HEADING_LENGTH = 30;

export function isSectionHeading(line: string): boolean {
  const text = line.trim();
  if (text.length < 3 || text.length >= MAX_HEADING_LENGTH) return false;

  const hasColon = text.includes(':');
  const startsWithCapital = /^[A-Z]/.test(text);
  // Requires a letter so a bare "01/15/2024 $350.00" row is not a heading
  const isAllCaps = /[A-Z]/.test(text) && text === text.toUpperCase() && text.length > 4;

  return (
    (hasColon && startsWithCapital) ||
    isAllCaps ||
    text.startsWith('Section') ||
    text.startsWith('#') ||
    (startsWithCapital && text.endsWith(':'))
  );
}
