/**
 * WikiAuth - Personal Access Token authentication and header masking
 *
 * Azure DevOps accepts a PAT as the password of HTTP Basic auth with an
 * empty user name.
 */

export const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key'];

export function buildAuthHeaders(pat: string): Record<string, string> {
  const encoded = Buffer.from(`:${pat}`, 'utf-8').toString('base64');
  return { Authorization: `Basic ${encoded}` };
}

export function maskSensitiveHeaders(headers: Record<string, string>): Record<string, string> {
  const masked = { ...headers };
  for (const key of Object.keys(masked)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      masked[key] = '[MASKED]';
    }
  }
  return masked;
}
