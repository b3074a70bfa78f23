export const REALM = 'Basic realm="Booking Admin"';

export type Credentials = { user: string; pass: string };

// atob keeps this usable from the edge middleware as well as route handlers.
export function parseBasicAuth(authHeader: string | null): Credentials | null {
  if (!authHeader || !authHeader.startsWith("Basic ")) return null;
  let decoded: string;
  try {
    decoded = atob(authHeader.slice(6).trim());
  } catch {
    return null;
  }
  const sep = decoded.indexOf(":");
  if (sep < 0) return null;
  return {
    user: decoded.slice(0, sep),
    pass: decoded.slice(sep + 1),
  };
}

export function matchesCredentials(
  authHeader: string | null,
  expected: Credentials,
): boolean {
  const creds = parseBasicAuth(authHeader);
  return !!creds && creds.user === expected.user && creds.pass === expected.pass;
}
