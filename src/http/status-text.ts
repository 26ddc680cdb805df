export type StatusCategory = "success" | "redirect" | "client_error" | "server_error" | "unknown";

export type StatusSeverity = "none" | "low" | "medium" | "high";

export interface StatusInfo {
  category: StatusCategory;
  severity: StatusSeverity;
  description: string;
  actionRequired: string;
}

const STATUS_DESCRIPTIONS: Readonly<Record<number, string>> = {
  200: "OK",
  201: "Created",
  204: "No Content",
  301: "Moved Permanently",
  302: "Found",
  304: "Not Modified",
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  429: "Too Many Requests",
  500: "Internal Server Error",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
};

type KnownStatus = [StatusSeverity, string, string];

const KNOWN_STATUS_INFO: Readonly<Record<number, KnownStatus>> = {
  200: ["none", "OK - Request successful", "none"],
  201: ["none", "Created - Resource created successfully", "none"],
  202: ["low", "Accepted - Request accepted for processing", "monitor"],
  204: ["none", "No Content - Request successful, no content returned", "none"],
  301: ["low", "Moved Permanently - Resource moved to new location", "update_url"],
  302: ["low", "Found - Resource temporarily moved", "monitor"],
  304: ["none", "Not Modified - Resource unchanged", "none"],
  307: ["low", "Temporary Redirect - Resource temporarily moved", "monitor"],
  308: ["medium", "Permanent Redirect - Resource permanently moved", "update_url"],
  400: ["high", "Bad Request - Invalid request syntax", "investigate"],
  401: ["high", "Unauthorized - Authentication required", "check_credentials"],
  403: ["high", "Forbidden - Access denied", "check_permissions"],
  404: ["high", "Not Found - Resource does not exist", "verify_url"],
  405: ["medium", "Method Not Allowed - HTTP method not supported", "check_method"],
  408: ["medium", "Request Timeout - Request took too long", "check_network"],
  409: ["medium", "Conflict - Request conflicts with current state", "investigate"],
  410: ["high", "Gone - Resource permanently removed", "remove_url"],
  429: ["medium", "Too Many Requests - Rate limit exceeded", "reduce_frequency"],
  500: ["high", "Internal Server Error - Server encountered an error", "contact_admin"],
  501: ["medium", "Not Implemented - Server does not support functionality", "investigate"],
  502: ["high", "Bad Gateway - Invalid response from upstream server", "check_upstream"],
  503: ["high", "Service Unavailable - Server temporarily unavailable", "retry_later"],
  504: ["high", "Gateway Timeout - Upstream server timeout", "check_upstream"],
  505: ["medium", "HTTP Version Not Supported - HTTP version not supported", "check_protocol"],
};

export function categorizeStatus(statusCode: number): StatusCategory {
  if (!Number.isInteger(statusCode)) {
    return "unknown";
  }

  if (statusCode >= 200 && statusCode < 300) {
    return "success";
  }

  if (statusCode >= 300 && statusCode < 400) {
    return "redirect";
  }

  if (statusCode >= 400 && statusCode < 500) {
    return "client_error";
  }

  if (statusCode >= 500 && statusCode < 600) {
    return "server_error";
  }

  return "unknown";
}

/** 2xx and 3xx count as available. */
export function isAvailableStatus(statusCode: number): boolean {
  const category = categorizeStatus(statusCode);
  return category === "success" || category === "redirect";
}

export function describeStatus(statusCode: number): string {
  return STATUS_DESCRIPTIONS[statusCode] ?? `HTTP ${statusCode}`;
}

export function getStatusInfo(statusCode: number): StatusInfo {
  const category = categorizeStatus(statusCode);
  const known = KNOWN_STATUS_INFO[statusCode];

  if (known) {
    const [severity, description, actionRequired] = known;
    return { category, severity, description, actionRequired };
  }

  switch (category) {
    case "success":
      return {
        category,
        severity: "low",
        description: `HTTP ${statusCode} - Success response`,
        actionRequired: "none",
      };
    case "redirect":
      return {
        category,
        severity: "low",
        description: `HTTP ${statusCode} - Redirection response`,
        actionRequired: "monitor",
      };
    case "client_error":
      return {
        category,
        severity: "high",
        description: `HTTP ${statusCode} - Client error`,
        actionRequired: "investigate",
      };
    case "server_error":
      return {
        category,
        severity: "high",
        description: `HTTP ${statusCode} - Server error`,
        actionRequired: "contact_admin",
      };
    case "unknown":
      return {
        category,
        severity: "high",
        description: `HTTP ${statusCode} - Unknown status code`,
        actionRequired: "investigate",
      };
    default: {
      const exhaustiveCheck: never = category;
      return exhaustiveCheck;
    }
  }
}
