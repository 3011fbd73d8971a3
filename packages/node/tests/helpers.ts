/**
 * Shared fixtures: an in-memory runtime with a scripted platform gateway.
 */

import { vi } from "vitest";
import pino from "pino";
import { loadConfig } from "../src/config.js";
import type { PlatformGateway } from "../src/platform.js";
import { createRuntime } from "../src/runtime.js";
import type { Runtime } from "../src/runtime.js";

export const TENANT = "guild-1";

export interface FakeGateway extends PlatformGateway {
  readonly roles: Map<string, string[]>;
  readonly voice: Map<string, string>;
}

export function createFakeGateway(): FakeGateway {
  const roles = new Map<string, string[]>();
  const voice = new Map<string, string>();
  return {
    roles,
    voice,
    addRole: vi.fn(async () => {}),
    removeRole: vi.fn(async () => {}),
    membersWithRole: vi.fn(async (_tenantId: string, roleId: string) => roles.get(roleId) ?? []),
    currentChannel: vi.fn(async (_tenantId: string, userId: string) => voice.get(userId)),
  };
}

export function createTestRuntime(
  gateway: PlatformGateway,
  now: Date,
  env: Record<string, string> = {},
): Runtime {
  return createRuntime({
    config: loadConfig({ DATABASE_PATH: ":memory:", ...env }),
    logger: pino({ level: "silent" }),
    gateway,
    now: () => now,
  });
}
