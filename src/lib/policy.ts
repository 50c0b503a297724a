import { ConfigurationError } from "./errors.js";
import type { PolicyVariant, TerminationPolicy, TerminationReason } from "./types.js";

export const POLICY_VARIANTS = [
  "timeline-strict",
  "timeline-loop-sensitive",
  "timeline-tolerant",
  "api-paged",
  "timeline-most-loop-sensitive",
] as const satisfies readonly PolicyVariant[];

export const DEFAULT_POLICIES: Readonly<Record<PolicyVariant, Readonly<TerminationPolicy>>> = {
  "timeline-strict": {
    maxPages: 10,
    maxEmptyPages: 2,
    httpFailureMode: "halt",
    duplicateDetection: { enabled: false, fingerprintSize: 0 },
    emptyDefinition: "post-dedupe-count",
  },
  "timeline-loop-sensitive": {
    maxPages: 50,
    maxEmptyPages: 2,
    httpFailureMode: "halt",
    duplicateDetection: { enabled: true, fingerprintSize: 3 },
    emptyDefinition: "post-dedupe-count",
  },
  "timeline-tolerant": {
    maxPages: 600,
    maxEmptyPages: 3,
    httpFailureMode: "tolerate-as-empty",
    duplicateDetection: { enabled: false, fingerprintSize: 0 },
    emptyDefinition: "post-dedupe-count",
  },
  "api-paged": {
    maxEmptyPages: 2,
    httpFailureMode: "halt",
    duplicateDetection: { enabled: false, fingerprintSize: 0 },
    emptyDefinition: "raw-extracted-count",
  },
  "timeline-most-loop-sensitive": {
    maxEmptyPages: 1,
    httpFailureMode: "tolerate-as-empty",
    duplicateDetection: { enabled: true, fingerprintSize: 5 },
    emptyDefinition: "post-dedupe-count",
  },
};

// The loop-sensitive timeline pins its empty-page guard alongside its fingerprint.
const FIXED_EMPTY_PAGE_GUARD: ReadonlySet<PolicyVariant> = new Set([
  "timeline-loop-sensitive",
]);

/**
 * `undefined` keeps the variant default, `null` removes the limit and a
 * number replaces it. `maxPages: 0` is kept: the first page is still
 * fetched and then the traversal stops. `maxEmptyPages: 0` turns the
 * empty-page guard off, the same as `null`.
 */
export interface PolicyOverrides {
  maxPages?: number | null;
  maxEmptyPages?: number | null;
}

export function resolvePolicy(
  variant: PolicyVariant,
  overrides: PolicyOverrides = {}
): TerminationPolicy {
  const base = DEFAULT_POLICIES[variant];
  const policy: TerminationPolicy = {
    ...base,
    duplicateDetection: { ...base.duplicateDetection },
  };

  if (overrides.maxPages !== undefined) {
    policy.maxPages = overrides.maxPages ?? undefined;
  }

  if (overrides.maxEmptyPages !== undefined) {
    if (FIXED_EMPTY_PAGE_GUARD.has(variant)) {
      console.warn(
        `Policy ${variant}: ignoring maxEmptyPages override (${overrides.maxEmptyPages}), the guard is fixed at ${base.maxEmptyPages}`
      );
    } else {
      const guard = overrides.maxEmptyPages;
      policy.maxEmptyPages = guard === null || guard === 0 ? undefined : guard;
    }
  }

  return validatePolicy(policy);
}

export function validatePolicy(policy: TerminationPolicy): TerminationPolicy {
  assertLimit("maxPages", policy.maxPages);
  assertLimit("maxEmptyPages", policy.maxEmptyPages);
  if (policy.maxEmptyPages === 0) {
    throw new ConfigurationError(
      "maxEmptyPages must be at least 1; leave it unset to disable the guard"
    );
  }

  const { enabled, fingerprintSize } = policy.duplicateDetection;
  if (enabled && (!Number.isInteger(fingerprintSize) || fingerprintSize <= 0)) {
    throw new ConfigurationError(
      `Duplicate detection needs a positive integer fingerprint size, got ${fingerprintSize}`
    );
  }

  return policy;
}

function assertLimit(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export type TerminationClass = "exhausted" | "blocked" | "ceiling" | "cancelled";

/** Groups a termination reason by what an operator should do about it. */
export function classifyTermination(reason: TerminationReason): TerminationClass {
  switch (reason) {
    case "fetch-failure":
      return "blocked";
    case "max-pages-reached":
      return "ceiling";
    case "cancelled":
      return "cancelled";
    case "empty-page-limit":
    case "duplicate-pagination":
    case "catalog-exhausted":
      return "exhausted";
  }
}
