/**
 * Validation for user-supplied request parameters of the counter service.
 * @module
 */

export type ValidationResult = { valid: true } | { valid: false; error: string };

const MAX_PATH_LENGTH = 1000;
const MAX_SEGMENTS = 20;
const MAX_SEGMENT_LENGTH = 100;
const MAX_PAGE_SIZE = 1000;
const MAX_REQUEST_COUNT = 1_000_000;
const SAFE_PATH = /^[a-zA-Z0-9/_.-]+$/;
// biome-ignore lint/suspicious/noControlCharactersInRegex: rejects C0 control characters
const CONTROL_CHARS = /[\u0000-\u001f]/;

const ok: ValidationResult = { valid: true };

function fail(error: string): ValidationResult {
  return { valid: false, error };
}

/** Validate the part of a request path after `/api/`. An empty path is allowed. */
export function validateApiPath(path: string): ValidationResult {
  if (!path) return ok;

  if (path.length > MAX_PATH_LENGTH) {
    return fail(`Path too long (max ${MAX_PATH_LENGTH} characters)`);
  }
  if (CONTROL_CHARS.test(path)) return fail("Invalid characters in path");
  if (!SAFE_PATH.test(path)) return fail("Path contains invalid characters");

  const segments = path.split("/").filter(Boolean);
  // Dots inside a segment are fine: generated tokens may contain "a..b".
  if (segments.some((segment) => segment === "." || segment === "..")) {
    return fail("Path traversal not allowed");
  }
  if (segments.length > MAX_SEGMENTS) {
    return fail(`Path too deeply nested (max ${MAX_SEGMENTS} segments)`);
  }
  if (segments.some((segment) => segment.length > MAX_SEGMENT_LENGTH)) {
    return fail(`Path segment too long (max ${MAX_SEGMENT_LENGTH} characters per segment)`);
  }
  return ok;
}

export function validatePagination(page: number, pageSize: number): ValidationResult {
  if (!Number.isInteger(page) || page < 0) return fail("Page number must be non-negative");
  if (!Number.isInteger(pageSize) || pageSize < 1) return fail("Page size must be positive");
  if (pageSize > MAX_PAGE_SIZE) return fail(`Page size cannot exceed ${MAX_PAGE_SIZE}`);
  return ok;
}

export function validateRequestCount(count: number): ValidationResult {
  if (!Number.isInteger(count) || count <= 0) return fail("Number of requests must be positive");
  if (count > MAX_REQUEST_COUNT) return fail("Number of requests too large (max 1,000,000)");
  return ok;
}
