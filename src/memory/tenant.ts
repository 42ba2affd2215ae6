import path from "node:path";

import { InvalidInputError } from "../errors.js";
import type { Tenant } from "./types.js";

export const TENANT_MAX_LENGTH = 128;

const TENANT_PATTERN = /^[A-Za-z0-9_.@-]+$/;

/**
 * Validate a tenant key. A valid key is a single safe path segment, so one
 * tenant can never address another tenant's files.
 */
export function assertTenant(value: unknown): Tenant {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidInputError("user_id is required");
  }
  if (value.length > TENANT_MAX_LENGTH) {
    throw new InvalidInputError(`user_id must be at most ${TENANT_MAX_LENGTH} characters`);
  }
  if (!TENANT_PATTERN.test(value) || value === "." || value === "..") {
    throw new InvalidInputError("user_id may only contain letters, digits, '_', '.', '@' and '-'", {
      userId: value,
    });
  }
  return value;
}

/**
 * Per-tenant file layout under <dataDir>/users/<tenant>/
 */
export class TenantPaths {
  private readonly usersDir: string;

  constructor(usersDir: string) {
    this.usersDir = usersDir;
  }

  dir(tenant: Tenant): string {
    return path.join(this.usersDir, assertTenant(tenant));
  }

  history(tenant: Tenant): string {
    return path.join(this.dir(tenant), "history.jsonl");
  }

  summary(tenant: Tenant): string {
    return path.join(this.dir(tenant), "summary.json");
  }

  profile(tenant: Tenant): string {
    return path.join(this.dir(tenant), "profile.md");
  }

  sequence(tenant: Tenant): string {
    return path.join(this.dir(tenant), "sequence.json");
  }
}
