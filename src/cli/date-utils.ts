/**
 * Date helpers for due dates. Due dates are local calendar days stored as YYYY-MM-DD.
 */

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

function startOfDay(date: Date): Date {
  const result = new Date(date);
  result.setHours(0, 0, 0, 0);
  return result;
}

/**
 * Parse a date string in YYYY-MM-DD format
 */
export function parseDate(dateStr: string): Date | null {
  const match = dateStr.match(ISO_DATE_REGEX);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  // Rejects rollovers such as 2024-02-30
  if (date.getFullYear() !== Number(year) || date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    return null;
  }
  return date;
}

export function formatDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Resolve 'today', 'tomorrow', '+3d' or '+2w' to YYYY-MM-DD.
 * Anything else is returned unchanged for the caller to validate.
 */
export function parseRelativeDate(spec: string, now: Date = new Date()): string {
  const today = startOfDay(now);

  const relativeMatch = spec.match(/^\+(\d+)([dw])$/i);
  if (relativeMatch) {
    const amount = Number(relativeMatch[1]);
    const unit = relativeMatch[2]?.toLowerCase();
    const result = new Date(today);
    result.setDate(result.getDate() + (unit === 'w' ? amount * 7 : amount));
    return formatDate(result);
  }

  switch (spec.toLowerCase()) {
    case 'today':
      return formatDate(today);

    case 'tomorrow': {
      const tomorrow = new Date(today);
      tomorrow.setDate(tomorrow.getDate() + 1);
      return formatDate(tomorrow);
    }

    default:
      return spec;
  }
}

/**
 * Check if a date string (YYYY-MM-DD) is before `today`
 */
export function isOverdue(dateStr: string, today: Date = new Date()): boolean {
  const date = parseDate(dateStr);
  if (!date) {
    return false;
  }
  return date < startOfDay(today);
}
