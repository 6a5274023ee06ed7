import { loadConfig, type Config } from '../config/index.js';
import { createServices, type Services } from '../services/index.js';
import type { AuditContext } from '../services/audit.service.js';
import { MemoryEntityStore } from '../store/memory.store.js';
import type { NewPrinciple, PrincipleRecord } from '../store/types.js';
import type { Framework, PrincipleCategory } from '../constants/enums.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const ACTOR: AuditContext = { actorId: 42, ipAddress: '127.0.0.1', userAgent: 'vitest' };

export const testConfig = (env: Record<string, string> = {}): Config => loadConfig({ NODE_ENV: 'test', ...env });

/** A clock that stays at `iso` until moved with `set`. */
export function fixedClock(iso: string): { now: () => Date; set: (next: string) => void } {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    set: (next) => {
      current = new Date(next);
    },
  };
}

export interface TestContext {
  store: MemoryEntityStore;
  services: Services;
  config: Config;
  logger: Logger;
  clock: ReturnType<typeof fixedClock>;
}

export function createTestContext(options: { now?: string; env?: Record<string, string> } = {}): TestContext {
  const config = testConfig(options.env);
  const logger = createLogger(config.server);
  const clock = fixedClock(options.now ?? '2025-03-10T09:00:00.000Z');
  const store = new MemoryEntityStore({ clock: clock.now });
  const services = createServices({ store, config, logger, clock: clock.now });
  return { store, services, config, logger, clock };
}

export const principle = (
  framework: Framework,
  code: string,
  category: PrincipleCategory,
  overrides: Partial<NewPrinciple> = {},
): NewPrinciple => ({
  framework,
  code,
  category,
  title: `Principle ${code}`,
  description: null,
  legalText: null,
  version: '1',
  effectiveDate: '2023-01-01',
  deprecatedDate: null,
  sortOrder: 0,
  ...overrides,
});

export async function addPrinciples(store: MemoryEntityStore, rows: NewPrinciple[]): Promise<PrincipleRecord[]> {
  return store.transaction(async (uow) => {
    const created: PrincipleRecord[] = [];
    for (const row of rows) created.push(await uow.principles.upsert(row));
    return created;
  });
}
