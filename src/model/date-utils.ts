/**
 * Date helpers for the `due` field: ISO dates plus a few relative shortcuts.
 */

function startOfDay(date: Date): Date {
  const result = new Date(date);
  result.setHours(0, 0, 0, 0);
  return result;
}

/**
 * Parse a date string in YYYY-MM-DD format
 */
export function parseDate(dateStr: string): Date | null {
  const match = dateStr.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  // Validate the date is real (e.g., not Feb 30)
  if (date.getFullYear() !== Number(year) || date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    return null;
  }
  return date;
}

export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Resolve 'today', 'tomorrow', '+Nd' and '+Nw' to YYYY-MM-DD.
 * Anything else is returned unchanged.
 */
export function parseRelativeDate(input: string): string {
  const today = startOfDay(new Date());

  const relativeMatch = input.match(/^\+(\d+)([dw])$/i);
  if (relativeMatch) {
    const amount = Number(relativeMatch[1]);
    const unit = relativeMatch[2]?.toLowerCase();
    const result = new Date(today);
    result.setDate(result.getDate() + (unit === 'w' ? amount * 7 : amount));
    return formatDate(result);
  }

  switch (input.toLowerCase()) {
    case 'today':
      return formatDate(today);

    case 'tomorrow': {
      const tomorrow = new Date(today);
      tomorrow.setDate(tomorrow.getDate() + 1);
      return formatDate(tomorrow);
    }

    default:
      return input;
  }
}

/** Normalize user input for a due date; null when it is not a date. */
export function normalizeDueDate(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return '';
  const resolved = parseRelativeDate(trimmed);
  return parseDate(resolved) ? resolved : null;
}
