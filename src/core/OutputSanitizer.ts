/**
 * OutputSanitizer - Redacts secrets from log output.
 *
 * API keys travel through invocations and error messages, so every
 * diagnostic line is passed through here before it reaches stderr.
 *
 * Singleton pattern - use getSanitizer() to access.
 */

export interface SanitizationPattern {
  regex: RegExp;
  replacement: string;
  description: string;
}

export class OutputSanitizer {
  private static instance: OutputSanitizer;
  private patterns: SanitizationPattern[];

  private constructor() {
    this.patterns = [
      // API Keys - Anthropic (sk-ant-...)
      {
        regex: /sk-ant-[A-Za-z0-9-_]{40,}/g,
        replacement: 'sk-ant-***REDACTED***',
        description: 'Anthropic API key'
      },
      {
        regex: /sk-[A-Za-z0-9-_]{40,}/g,
        replacement: 'sk-***REDACTED***',
        description: 'Generic sk- API key'
      },
      // Bearer Tokens
      {
        regex: /Bearer\s+[A-Za-z0-9._-]{20,}/gi,
        replacement: 'Bearer ***REDACTED***',
        description: 'Bearer token'
      },
      // JWT Tokens (three base64url parts separated by dots)
      {
        regex: /eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g,
        replacement: '[JWT_REDACTED]',
        description: 'JWT token'
      },
      // Inline password/secret assignments (various formats)
      {
        regex: /(password|secret|api_key|apikey|api-key|token|access_token)\s*[:=]\s*['"][^'"]{8,}['"]/gi,
        replacement: '$1: "***REDACTED***"',
        description: 'Inline secret assignment'
      },
      // Environment variable patterns in output
      {
        regex: /(ANTHROPIC_API_KEY|OPENAI_API_KEY)\s*=\s*[^\s\n]+/gi,
        replacement: '$1=***REDACTED***',
        description: 'Environment variable'
      }
    ];
  }

  /**
   * Get the singleton instance.
   */
  static getInstance(): OutputSanitizer {
    if (!OutputSanitizer.instance) {
      OutputSanitizer.instance = new OutputSanitizer();
    }
    return OutputSanitizer.instance;
  }

  /**
   * Sanitize text by redacting any detected secrets.
   */
  sanitize(text: string): string {
    if (!text) {
      return text;
    }

    let sanitized = text;
    for (const pattern of this.patterns) {
      sanitized = sanitized.replace(pattern.regex, pattern.replacement);
    }
    return sanitized;
  }

  /**
   * Sanitize an Error object - returns a new Error with sanitized message.
   */
  sanitizeError(error: Error): Error {
    const sanitizedError = new Error(this.sanitize(error.message));
    sanitizedError.name = error.name;
    if (error.stack) {
      sanitizedError.stack = this.sanitize(error.stack);
    }
    return sanitizedError;
  }
}

/**
 * Get the singleton OutputSanitizer instance.
 */
export function getSanitizer(): OutputSanitizer {
  return OutputSanitizer.getInstance();
}

/**
 * Convenience function to sanitize text.
 */
export function sanitize(text: string): string {
  return getSanitizer().sanitize(text);
}
