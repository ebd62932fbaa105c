import type { AppConfig } from "./config.js";
import { thresholdsSchema } from "./screener/thresholds.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - API key is at least 16 characters (warning if shorter)
 * - Yahoo timeout is positive
 * - Exchange suffix is set (warning if it doesn't start with ".")
 * - Exchange time zone is a valid IANA zone
 * - Export filename is set and ends in .csv (warning)
 * - Every default screen threshold is inside its allowed range
 * - Default codes are set (warning)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  // Warn if API key is too short (non-fatal, but insecure)
  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  if (!Number.isFinite(cfg.yahoo.timeoutMs) || cfg.yahoo.timeoutMs <= 0) {
    errors.push(`yahoo.timeoutMs must be positive, got ${cfg.yahoo.timeoutMs}`);
  }

  if (!cfg.screen.exchangeSuffix) {
    errors.push("Exchange suffix is required");
  } else if (!cfg.screen.exchangeSuffix.startsWith(".")) {
    warnings.push(`Exchange suffix "${cfg.screen.exchangeSuffix}" does not start with "." — symbols may not resolve`);
  }

  if (!isValidTimeZone(cfg.screen.timeZone)) {
    errors.push(`Exchange time zone is not a valid IANA zone: ${cfg.screen.timeZone}`);
  }

  if (!cfg.screen.exportFilename) {
    errors.push("Export filename is required");
  } else if (!cfg.screen.exportFilename.toLowerCase().endsWith(".csv")) {
    warnings.push(`Export filename "${cfg.screen.exportFilename}" does not end in .csv`);
  }

  const thresholds = thresholdsSchema.safeParse(cfg.screen.defaults);
  if (!thresholds.success) {
    for (const issue of thresholds.error.issues) {
      errors.push(`Default threshold invalid: ${issue.message}`);
    }
  }

  if (!cfg.screen.defaultCodes.trim()) {
    warnings.push("DEFAULT_CODES is empty — runs without explicit codes will be rejected");
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
