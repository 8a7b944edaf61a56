// ===========================================
// LOG SANITIZATION
// ===========================================

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Bearer tokens
  { pattern: /Bearer\s+[A-Za-z0-9\-_.~+/]+=*/gi, replacement: 'Bearer [REDACTED]' },

  // Secrets and tokens written as key/value pairs
  { pattern: /(client_secret|access_token|secret|password)["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: '$1: [REDACTED]' },

  // PEM blocks
  { pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g, replacement: '[REDACTED_PRIVATE_KEY]' },

  // Signatures (if logged accidentally)
  { pattern: /signature["']?\s*[:=]\s*["']?[A-Za-z0-9+/]{40,}=*/gi, replacement: 'signature: [REDACTED]' },
];

const SENSITIVE_KEYS = new Set([
  'authorization',
  'signature',
  'access_token',
  'accesstoken',
  'client_secret',
  'clientsecret',
  'secret',
  'password',
  'token',
]);

export function sanitizeLogData(data: unknown): unknown {
  if (typeof data === 'string') {
    let sanitized = data;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeLogData(item));
  }

  if (typeof data === 'object' && data !== null && !(data instanceof Date)) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogData(value);
      }
    }
    return sanitized;
  }

  return data;
}
