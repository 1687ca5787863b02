/**
 * "wHEAT " → "Wheat"
 */
export function capitalize(value: string): string {
  const trimmed = value.trim();
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

/**
 * " new  DELHI" → "New Delhi"
 */
export function titleCase(value: string): string {
  return value.trim().split(/\s+/).map(capitalize).join(' ');
}
