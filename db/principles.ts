import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { FRAMEWORKS, FRAMEWORK_CATEGORIES, parseEnum, type Framework } from '../src/constants/enums.js';
import type { EntityStore, NewPrinciple, PrincipleRecord } from '../src/store/types.js';
import type { Logger } from '../src/utils/logger.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const principleFileSchema = z.object({
  framework: z.enum(FRAMEWORKS),
  version: z.string().min(1),
  effectiveDate: isoDate,
  principles: z
    .array(
      z.object({
        code: z.string().min(1),
        category: z.string(),
        title: z.string().min(1),
        description: z.string().nullable().default(null),
        legalText: z.string().nullable().default(null),
        deprecatedDate: isoDate.nullable().default(null),
        sortOrder: z.number().int().nonnegative(),
      }),
    )
    .min(1),
});

export const PRINCIPLE_FILES: Record<Framework, URL> = {
  nsm: new URL('./seed-data/nsm-principles.json', import.meta.url),
  ekom: new URL('./seed-data/ekom-principles.json', import.meta.url),
};

/** Validates a principle catalogue and flattens it into rows for the store. */
export function toPrinciples(input: unknown): NewPrinciple[] {
  const file = principleFileSchema.parse(input);
  const codes = new Set<string>();
  return file.principles.map((entry, index) => {
    if (codes.has(entry.code)) throw new Error(`Duplicate ${file.framework} principle code: ${entry.code}`);
    codes.add(entry.code);
    return {
      framework: file.framework,
      code: entry.code,
      category: parseEnum(FRAMEWORK_CATEGORIES[file.framework], entry.category, `principles.${index}.category`),
      title: entry.title,
      description: entry.description,
      legalText: entry.legalText,
      version: file.version,
      effectiveDate: file.effectiveDate,
      deprecatedDate: entry.deprecatedDate,
      sortOrder: entry.sortOrder,
    };
  });
}

export async function loadPrinciples(framework: Framework): Promise<NewPrinciple[]> {
  const text = await readFile(PRINCIPLE_FILES[framework], 'utf8');
  const principles = toPrinciples(JSON.parse(text));
  if (principles.some((principle) => principle.framework !== framework)) {
    throw new Error(`${PRINCIPLE_FILES[framework].pathname} does not hold ${framework} principles`);
  }
  return principles;
}

/** Inserts or refreshes every principle of a framework by code, in one transaction. */
export async function seedPrinciples(store: EntityStore, framework: Framework, logger?: Logger): Promise<PrincipleRecord[]> {
  const principles = await loadPrinciples(framework);
  const seeded = await store.transaction(async (uow) => {
    const rows: PrincipleRecord[] = [];
    for (const principle of principles) rows.push(await uow.principles.upsert(principle));
    return rows;
  });
  logger?.info(`Seeded ${seeded.length} ${framework} principles`);
  return seeded;
}
