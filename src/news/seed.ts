import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CategorySchema, PillarSchema, PrioritySchema } from "../domain.js";
import { logger } from "../logger.js";
import type { SourceStore } from "../store/types.js";

const SourcesFileSchema = z.object({
  accounts: z
    .array(
      z.object({
        handle: z.string().min(1),
        category: CategorySchema,
        subcategory: z.string().optional(),
        priority: PrioritySchema.default(2),
        isVoiceReference: z.boolean().default(false),
        voicePillars: z.array(PillarSchema).default([])
      })
    )
    .default([]),
  feeds: z
    .array(
      z.object({
        name: z.string().min(1),
        url: z.string().url(),
        category: CategorySchema,
        priority: PrioritySchema.default(2),
        keywords: z.array(z.string()).default([])
      })
    )
    .default([])
});

export type SourcesFile = z.infer<typeof SourcesFileSchema>;

export async function loadSourcesFile(filePath: string): Promise<SourcesFile> {
  const p = path.resolve(process.cwd(), filePath);
  const parsed = SourcesFileSchema.safeParse(JSON.parse(await readFile(p, "utf8")));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid sources file ${p}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`);
  }
  return parsed.data;
}

export type SeedResult = { accountsAdded: number; feedsAdded: number };

/** Insert accounts and feeds that are not in the store yet; existing ones stay as they are. */
export async function seedSources(store: SourceStore, sources: SourcesFile): Promise<SeedResult> {
  let accountsAdded = 0;
  for (const a of sources.accounts) {
    if (await store.findAccount(a.handle)) continue;
    await store.addAccount({
      handle: a.handle,
      category: a.category,
      subcategory: a.subcategory ?? null,
      priority: a.priority,
      isVoiceReference: a.isVoiceReference,
      voicePillars: a.voicePillars
    });
    accountsAdded++;
  }

  const knownUrls = new Set((await store.listRssSources()).map((s) => s.url));
  let feedsAdded = 0;
  for (const f of sources.feeds) {
    if (knownUrls.has(f.url)) continue;
    await store.addRssSource(f);
    knownUrls.add(f.url);
    feedsAdded++;
  }

  logger.info("seed.done", { accountsAdded, feedsAdded });
  return { accountsAdded, feedsAdded };
}
