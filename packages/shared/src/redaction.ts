const REDACTION_PLACEHOLDER = '[REDACTED]';

// Common token prefixes and patterns
const tokenPatterns = [
  /gh[pousr]_[a-zA-Z0-9]{20,}/g, // GitHub token
  /github_pat_[a-zA-Z0-9_]{20,}/g, // GitHub fine-grained token
  /Bearer\s+[A-Za-z0-9._~+/=-]+/g, // Authorization header value
];

// Patterns for environment variables
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

// Pattern for private keys
const privateKeyPattern = /-----BEGIN [A-Z ]*PRIVATE KEY-----(?:.|\n|\r)*?-----END [A-Z ]*PRIVATE KEY-----/g;

const allPatterns = [...tokenPatterns, ...envVarPatterns, privateKeyPattern];

// Keys whose values are always hidden, whatever they look like
const sensitiveKeys = new Set(['authorization', 'token', 'apikey', 'api_key', 'secret', 'password']);

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (sensitiveKeys.has(key.toLowerCase()) && value !== undefined && value !== '') {
        redactedObj[key] = REDACTION_PLACEHOLDER;
        totalRedactions += 1;
        continue;
      }
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}

/**
 * Redacts a structured value before it is written to a log sink.
 */
export function redactForLogs<T>(input: T): unknown {
  return redact(input);
}
