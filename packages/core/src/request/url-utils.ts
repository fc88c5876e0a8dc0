/**
 * Normalizes a configured base URL so that operation paths can be appended
 * to it directly.
 *
 * @param baseUrl - Base URL, with or without trailing slashes
 * @returns Base URL for API requests
 */
export function getBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

/**
 * Properly join baseUrl and path to ensure correct slash handling
 */
export function joinPath(baseUrl: string, path: string): string {
  const base = getBaseUrl(baseUrl);
  return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`;
}

if (import.meta.vitest) {
  const { it, expect } = import.meta.vitest;

  it('should return the base URL unchanged', () => {
    expect(getBaseUrl('https://api.mention.net/api')).toBe('https://api.mention.net/api');
  });

  it('should remove trailing slashes', () => {
    expect(getBaseUrl('https://api.mention.net/api//')).toBe('https://api.mention.net/api');
  });

  it('should join paths with and without a leading slash', () => {
    expect(joinPath('https://api.example.com/', '/app/data')).toBe('https://api.example.com/app/data');
    expect(joinPath('https://api.example.com', 'app/data')).toBe('https://api.example.com/app/data');
  });
}
