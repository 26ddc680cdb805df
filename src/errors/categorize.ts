import type { ErrorCategory, ErrorSeverity } from "./service";

export interface ErrorCategorization {
  category: ErrorCategory;
  severity: ErrorSeverity;
  recommendedAction: string;
}

interface CategoryRule extends ErrorCategorization {
  pattern: RegExp;
}

// First match wins.
const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    pattern: /could not resolve host|name or service not known/i,
    category: "NETWORK",
    severity: "HIGH",
    recommendedAction: "check_dns",
  },
  {
    pattern: /connection refused|failed to connect/i,
    category: "NETWORK",
    severity: "HIGH",
    recommendedAction: "check_connectivity",
  },
  {
    pattern: /timeout|timed out/i,
    category: "TIMEOUT",
    severity: "MEDIUM",
    recommendedAction: "increase_timeout",
  },
  {
    pattern: /SSL|TLS|certificate/i,
    category: "NETWORK",
    severity: "HIGH",
    recommendedAction: "check_certificates",
  },
  {
    pattern: /HTTP|status/,
    category: "HTTP",
    severity: "MEDIUM",
    recommendedAction: "check_endpoint",
  },
  {
    pattern: /config/i,
    category: "CONFIG",
    severity: "HIGH",
    recommendedAction: "check_configuration",
  },
  {
    pattern: /permission|access denied|EACCES|EPERM/i,
    category: "SYSTEM",
    severity: "HIGH",
    recommendedAction: "check_permissions",
  },
  {
    pattern: /disk|space|storage|ENOSPC/i,
    category: "SYSTEM",
    severity: "CRITICAL",
    recommendedAction: "free_disk_space",
  },
  {
    pattern: /content|hash/i,
    category: "CONTENT",
    severity: "LOW",
    recommendedAction: "verify_content",
  },
];

/**
 * Maps a free-text failure message onto the error taxonomy.
 */
export function categorizeError(message: string): ErrorCategorization {
  if (message.trim().length === 0) {
    return { category: "UNKNOWN", severity: "HIGH", recommendedAction: "investigate" };
  }

  for (const rule of CATEGORY_RULES) {
    if (rule.pattern.test(message)) {
      return {
        category: rule.category,
        severity: rule.severity,
        recommendedAction: rule.recommendedAction,
      };
    }
  }

  return { category: "UNKNOWN", severity: "MEDIUM", recommendedAction: "investigate" };
}
