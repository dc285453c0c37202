// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Security utilities: capability masking, safe logging helpers. */

/**
 * Mask a capability id for safe display in logs or CLI output.
 * Capability ids are bearer secrets: only a short prefix is kept.
 *
 * @example
 *   maskCapability("cap_3f9a1c2e-77d0-4b6e-9f35-2a1c") → "cap_3f9a***"
 */
export function maskCapability(capabilityId: string): string {
  if (!capabilityId || capabilityId.length === 0) return "(empty)";
  const prefixLen = Math.min(8, Math.floor(capabilityId.length / 3));
  return `${capabilityId.slice(0, prefixLen)}***`;
}

/**
 * Safely read an environment variable.
 * Returns undefined (not an empty string) if not set.
 */
export function envVar(name: string): string | undefined {
  const val = process.env[name];
  return val && val.trim().length > 0 ? val.trim() : undefined;
}
