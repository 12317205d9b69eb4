/**
 * Percent-decodes a placeholder value; malformed sequences are kept as written.
 */
export function decodeURIComponentSafe(value: string): string {
  if (!value.includes('%')) {
    return value;
  }

  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) {
      return value;
    }

    throw error;
  }
}
